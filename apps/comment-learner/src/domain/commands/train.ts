/**
 * @fileoverview Training command
 *
 * Builds a tree from labeled comment records and exports it.
 *
 * @module domain/commands/train
 */

import {
    TreeBuilder,
    describeTree,
    serializeTree,
    type EngineLogger,
    type FeatureRegistry,
    type LabeledEntity,
    type TreeNode,
} from "@comment-tree/engine";

export interface TrainingOptions {
    registry: FeatureRegistry;
    entities: readonly LabeledEntity[];
    minEntities?: number;
    minEntropy?: number;
    logger: EngineLogger;
}

export interface TrainingResult {
    tree: TreeNode;

    /** Exported tree as JSON text */
    json: string;
}

/**
 * Train a tree and export it. The indented tree dump goes to the logger
 * at debug level.
 */
export function runTraining(options: TrainingOptions): TrainingResult {
    const builder = new TreeBuilder(options.registry, {
        minEntities: options.minEntities,
        minEntropy : options.minEntropy,
        logger     : options.logger,
    });

    const tree = builder.train(options.entities);

    for (const line of describeTree(tree)) {
        options.logger.debug(line);
    }

    return { tree, json: serializeTree(tree) };
}
