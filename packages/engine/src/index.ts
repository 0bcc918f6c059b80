/**
 * @fileoverview Comment Tree Engine
 *
 * Entropy-driven decision-tree induction over labeled entities.
 *
 * The engine provides:
 * - Discrete, membership and quantitative features
 * - Greedy recursive tree building with entropy and size stopping rules
 * - A JSON-safe tree codec with schema-validated import
 * - Classification with default-label fallback and precision/recall/F1 scoring
 *
 * @module @comment-tree/engine
 * @example
 * ```typescript
 * import {
 *     FeatureRegistry,
 *     TreeBuilder,
 *     serializeTree,
 *     parseTree,
 *     scoreAll,
 * } from "@comment-tree/engine";
 *
 * const registry = FeatureRegistry.fromSpecs(specs);
 * const tree = new TreeBuilder(registry).train(trainingSet);
 * const text = serializeTree(tree);
 *
 * const report = scoreAll(parseTree(registry, text), testSet);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    AttributeValue,
    Label,
    LabeledEntity,
    Feature,
    FeatureKind,
    SplitArg,
    BranchValue,
    Partition,
    SplitResult,
    TreeNode,
    TreeBranch,
    TreeLeaf,
    EntityProvider,
    FetchOptions,
    FetchResult,
    EngineLogger,
    LogLevel,
    ConsoleLoggerOptions,
} from "./contracts/index.js";
export {
    createEntity,
    createBranch,
    createLeaf,
    isBranch,
    collectEntities,
    createConsoleLogger,
    silentLogger,
    isLogLevel,
    InvalidSplitError,
    UnknownFeatureError,
    TreeParseError,
    EmptyInputError,
    DuplicateFeatureError,
    isInvalidSplit,
} from "./contracts/index.js";

// ============================================================================
// Metrics exports
// ============================================================================

export {
    entropy,
    labelCounts,
    datasetEntropy,
    majorityLabel,
    weightedEntropy,
} from "./metrics/entropy.js";

// ============================================================================
// Feature exports
// ============================================================================

export {
    BaseFeature,
    tokenize,
    kTOKEN_SEPARATOR,
    DiscreteFeature,
    IndexedDiscreteFeature,
    MembershipFeature,
    IndexedMembershipFeature,
    QuantitativeFeature,
    QuantitativeBranch,
    type QuantitativeBranchValue,
    FeatureRegistry,
    createFeature,
    type FeatureSpec,
} from "./features/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    TreeBuilder,
    kDEFAULT_MIN_ENTROPY,
    kDEFAULT_MIN_ENTITIES,
    type TreeBuilderConfig,
    exportTree,
    importTree,
    serializeTree,
    parseTree,
    describeTree,
    ExportedTreeSchema,
    type ExportedTree,
    type ExportedBranch,
    classify,
    scoreAll,
    formatScoreReport,
    type LabelScore,
    type ScoreReport,
} from "./engine/index.js";
