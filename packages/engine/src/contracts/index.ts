/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces, node types and errors shared by every engine component.
 *
 * @module @comment-tree/engine/contracts
 */

// Entity contract
export type {
    AttributeValue,
    Label,
    LabeledEntity,
} from "./Entity.js";
export { createEntity } from "./Entity.js";

// Feature contract
export type {
    Feature,
    FeatureKind,
    SplitArg,
    BranchValue,
    Partition,
    SplitResult,
} from "./Feature.js";

// Tree nodes
export type { TreeNode, TreeBranch, TreeLeaf } from "./TreeNode.js";
export { createBranch, createLeaf, isBranch } from "./TreeNode.js";

// EntityProvider contract
export type {
    EntityProvider,
    FetchOptions,
    FetchResult,
} from "./EntityProvider.js";
export { collectEntities } from "./EntityProvider.js";

// Logger
export type { EngineLogger, LogLevel, ConsoleLoggerOptions } from "./Logger.js";
export { createConsoleLogger, silentLogger, isLogLevel } from "./Logger.js";

// Errors
export {
    InvalidSplitError,
    UnknownFeatureError,
    TreeParseError,
    EmptyInputError,
    DuplicateFeatureError,
    isInvalidSplit,
} from "./Errors.js";
