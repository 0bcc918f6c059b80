/**
 * Engine Errors
 *
 * Every error the engine throws on purpose. Each carries a stable `name`
 * so callers can tell them apart after crossing module boundaries.
 */

/**
 * A feature cannot form two or more non-empty partitions on a subset.
 *
 * Expected during tree induction: the builder drops the feature as a
 * candidate for that node and moves on.
 */
export class InvalidSplitError extends Error {
    readonly featureName: string;

    constructor(featureName: string, reason: string) {
        super(`Invalid split for ${featureName}: ${reason}`);
        this.name = "InvalidSplitError";
        this.featureName = featureName;
    }
}

/**
 * A persisted tree references a feature the registry does not hold.
 */
export class UnknownFeatureError extends Error {
    readonly featureName: string;

    constructor(featureName: string) {
        super(`Unknown feature: ${featureName}`);
        this.name = "UnknownFeatureError";
        this.featureName = featureName;
    }
}

/**
 * A persisted tree does not match the Branch/Leaf grammar.
 */
export class TreeParseError extends Error {
    /** Location inside the persisted structure, e.g. "$[3][1][1]" */
    readonly path: string;

    constructor(message: string, path = "$") {
        super(`Malformed tree at ${path}: ${message}`);
        this.name = "TreeParseError";
        this.path = path;
    }
}

/**
 * An operation that needs at least one entity or count received none.
 */
export class EmptyInputError extends Error {
    constructor(operation: string) {
        super(`${operation} requires a non-empty input`);
        this.name = "EmptyInputError";
    }
}

/**
 * A feature with the same name is already registered.
 */
export class DuplicateFeatureError extends Error {
    readonly featureName: string;

    constructor(featureName: string) {
        super(`Feature already registered: ${featureName}`);
        this.name = "DuplicateFeatureError";
        this.featureName = featureName;
    }
}

/**
 * Type guard for the split signal, used where candidates are collected.
 */
export function isInvalidSplit(error: unknown): error is InvalidSplitError {
    return error instanceof InvalidSplitError;
}
