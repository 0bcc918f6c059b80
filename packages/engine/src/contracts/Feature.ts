/**
 * Feature Contract
 *
 * A feature is a named rule that extracts a value from an entity and
 * proposes the entropy-minimizing partition of an entity set. The same
 * rule routes a single entity at classification time.
 *
 * Design principles:
 * - Stateless: a feature instance can be reused across recursive calls
 * - Deterministic: same entities in the same order give the same split
 * - Closed: the engine ships five variants, identified by `kind`
 */

import type { LabeledEntity } from "./Entity.js";

/**
 * The five feature variants.
 */
export type FeatureKind =
    | "discrete"
    | "discrete-indexed"
    | "membership"
    | "membership-indexed"
    | "quantitative";

/**
 * Argument chosen by a split and needed again by `identify()`.
 *
 * - Discrete variants: `null`
 * - Membership variants: the chosen token
 * - Quantitative: the threshold (first value of the upper group)
 */
export type SplitArg = string | number | null;

/**
 * Key of a child under a branch.
 */
export type BranchValue = string | number | boolean | null;

/**
 * One subset of a split.
 */
export interface Partition {
    readonly value: BranchValue;
    readonly entities: readonly LabeledEntity[];
}

/**
 * A candidate partition proposed by one feature.
 */
export interface SplitResult {
    /** Weighted entropy after the split: Σ |subset|·H(subset) / |entities| */
    readonly entropy: number;

    readonly arg: SplitArg;

    /** Ordered subsets; every input entity is in exactly one */
    readonly partitions: readonly Partition[];
}

/**
 * Feature interface.
 *
 * `split()` throws `InvalidSplitError` when it cannot discriminate the
 * given set. That is a normal outcome, not a failure.
 */
export interface Feature {
    /** Unique name, e.g. "DF:type", "MF1:posTags", "QF:deltaLine" */
    readonly name: string;

    /** The attribute this feature reads */
    readonly attribute: string;

    readonly kind: FeatureKind;

    /**
     * Extract this feature's value from an entity.
     */
    extract(entity: LabeledEntity): unknown;

    /**
     * Propose a partition of `entities`.
     *
     * @throws InvalidSplitError if fewer than two non-empty partitions can be formed
     */
    split(entities: readonly LabeledEntity[]): SplitResult;

    /**
     * Route one entity using the argument a previous split produced.
     */
    identify(arg: SplitArg, entity: LabeledEntity): BranchValue;

    /**
     * Whether `arg` has the shape this variant's splits produce.
     */
    isValidArg(arg: SplitArg): boolean;
}
