/**
 * @fileoverview Engine barrel exports
 *
 * @module @comment-tree/engine/engine
 */

export {
    TreeBuilder,
    kDEFAULT_MIN_ENTROPY,
    kDEFAULT_MIN_ENTITIES,
    type TreeBuilderConfig,
} from "./TreeBuilder.js";
export {
    exportTree,
    importTree,
    serializeTree,
    parseTree,
    describeTree,
    ExportedTreeSchema,
    type ExportedTree,
    type ExportedBranch,
} from "./TreeCodec.js";
export {
    classify,
    scoreAll,
    formatScoreReport,
    type LabelScore,
    type ScoreReport,
} from "./Evaluator.js";
