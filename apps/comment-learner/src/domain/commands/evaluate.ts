/**
 * @fileoverview Evaluation command
 *
 * Loads an exported tree and scores it against labeled comment records.
 *
 * @module domain/commands/evaluate
 */

import {
    formatScoreReport,
    parseTree,
    scoreAll,
    type FeatureRegistry,
    type LabeledEntity,
    type ScoreReport,
} from "@comment-tree/engine";

export interface EvaluationOptions {
    registry: FeatureRegistry;

    /** Exported tree as JSON text */
    treeText: string;

    entities: readonly LabeledEntity[];
}

export interface EvaluationResult {
    report: ScoreReport;

    /** Report lines, one per label, then `correct/total` */
    lines: string[];
}

/**
 * Score an exported tree.
 *
 * @throws TreeParseError or UnknownFeatureError for a tree the registry cannot load
 */
export function runEvaluation(options: EvaluationOptions): EvaluationResult {
    const tree = parseTree(options.registry, options.treeText);
    const report = scoreAll(tree, options.entities);
    return { report, lines: formatScoreReport(report) };
}
