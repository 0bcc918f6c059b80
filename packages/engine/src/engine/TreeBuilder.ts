/**
 * @fileoverview TreeBuilder
 *
 * Greedy, entropy-driven induction of a decision tree.
 *
 * Build flow for one entity subset:
 * 1. Count labels and measure entropy
 * 2. Stop if entropy or subset size is below its threshold
 * 3. Ask every registered feature for a split
 * 4. Lowest weighted entropy wins (earliest registered on ties)
 * 5. Recurse into each partition; stopped subsets become leaves
 *
 * Every successful split yields proper, non-empty subsets, so recursion
 * always terminates.
 *
 * @module @comment-tree/engine/engine/TreeBuilder
 */

import type { LabeledEntity } from "../contracts/Entity.js";
import { isInvalidSplit } from "../contracts/Errors.js";
import type { BranchValue, Feature, SplitResult } from "../contracts/Feature.js";
import { silentLogger, type EngineLogger } from "../contracts/Logger.js";
import {
    createBranch,
    createLeaf,
    type TreeNode,
} from "../contracts/TreeNode.js";
import type { FeatureRegistry } from "../features/FeatureRegistry.js";
import { entropy, labelCounts, majorityLabel } from "../metrics/entropy.js";

/**
 * Builder configuration options.
 */
export interface TreeBuilderConfig {
    /** Subsets with entropy below this become leaves (default: 0.10) */
    readonly minEntropy?: number;

    /** Subsets with fewer entities become leaves (default: 10) */
    readonly minEntities?: number;

    /** Logger for build traces (debug level) and summaries (default: silent) */
    readonly logger?: EngineLogger;
}

export const kDEFAULT_MIN_ENTROPY = 0.10;
export const kDEFAULT_MIN_ENTITIES = 10;

interface Candidate {
    readonly feature: Feature;
    readonly split: SplitResult;
}

/**
 * TreeBuilder - recursive greedy feature selection.
 *
 * @example
 * ```typescript
 * const registry = FeatureRegistry.fromSpecs([
 *     { kind: "discrete", attribute: "type" },
 *     { kind: "membership", attribute: "posTags" },
 * ]);
 * const builder = new TreeBuilder(registry, { minEntities: 5 });
 *
 * const root = builder.build(entities); // TreeNode | null
 * ```
 */
export class TreeBuilder {
    private readonly config: Required<TreeBuilderConfig>;
    private readonly registry: FeatureRegistry;

    constructor(registry: FeatureRegistry, config: TreeBuilderConfig = {}) {
        this.registry = registry;
        this.config = {
            minEntropy : config.minEntropy ?? kDEFAULT_MIN_ENTROPY,
            minEntities: config.minEntities ?? kDEFAULT_MIN_ENTITIES,
            logger     : config.logger ?? silentLogger,
        };
    }

    /**
     * Induce a tree from `entities`.
     *
     * @returns The root branch, or null when the set is already pure
     *          enough, too small, or no feature can split it
     * @throws EmptyInputError if `entities` is empty
     */
    build(entities: readonly LabeledEntity[]): TreeNode | null {
        return this.buildNode(entities, 0);
    }

    /**
     * Like `build()`, but a stopped root becomes a leaf holding the
     * majority label, so there is always a tree to persist.
     */
    train(entities: readonly LabeledEntity[]): TreeNode {
        const root = this.build(entities);
        if (root) {
            return root;
        }

        const label = majorityLabel(labelCounts(entities));
        this.config.logger.info("No split at root; tree is a single leaf", {
            entities: entities.length,
            label,
        });
        return createLeaf(label);
    }

    private buildNode(entities: readonly LabeledEntity[], depth: number): TreeNode | null {
        const { logger, minEntropy, minEntities } = this.config;
        const counts = labelCounts(entities);
        const impurity = entropy(counts.values());

        logger.debug(`${indent(depth)}Build`, {
            depth,
            entities: entities.length,
            counts  : Object.fromEntries(counts),
            entropy : round(impurity),
        });

        if (impurity < minEntropy) {
            logger.debug(`${indent(depth)} Too little entropy. Stopping.`, { depth });
            return null;
        }
        if (entities.length < minEntities) {
            logger.debug(`${indent(depth)} Too few entities. Stopping.`, { depth });
            return null;
        }

        const winner = this.selectSplit(entities);
        if (!winner) {
            logger.debug(`${indent(depth)} No discerning feature. Stopping.`, { depth });
            return null;
        }

        const { feature, split } = winner;
        logger.debug(`${indent(depth)}Feature ${feature.name}`, {
            depth,
            arg       : split.arg,
            entropy   : round(split.entropy),
            partitions: split.partitions.length,
        });

        const children = new Map<BranchValue, TreeNode>();
        for (const partition of split.partitions) {
            logger.debug(`${indent(depth)} Value ${String(partition.value)} ->`, {
                depth,
                entities: partition.entities.length,
            });

            const child = this.buildNode(partition.entities, depth + 1);
            if (child) {
                children.set(partition.value, child);
                continue;
            }

            const label = majorityLabel(labelCounts(partition.entities));
            logger.debug(`${indent(depth)} Leaf ${String(partition.value)} -> ${label}`, { depth });
            children.set(partition.value, createLeaf(label));
        }

        return createBranch(feature, split.arg, majorityLabel(counts), children);
    }

    /**
     * Ask every feature for a split and keep the lowest weighted entropy.
     * Features that cannot split the set are skipped.
     */
    private selectSplit(entities: readonly LabeledEntity[]): Candidate | null {
        let winner: Candidate | null = null;

        for (const feature of this.registry) {
            let split: SplitResult;
            try {
                split = feature.split(entities);
            }
            catch (error) {
                if (isInvalidSplit(error)) {
                    continue;
                }
                throw error;
            }

            if (!winner || split.entropy < winner.split.entropy) {
                winner = { feature, split };
            }
        }

        return winner;
    }
}

function indent(depth: number): string {
    return "  ".repeat(depth);
}

function round(value: number): number {
    return Math.round(value * 1000) / 1000;
}
