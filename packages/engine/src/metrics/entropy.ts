/**
 * @fileoverview Entropy Metrics
 *
 * Pure functions over label distributions. Every impurity figure the
 * builder compares comes from here.
 *
 * @module @comment-tree/engine/metrics/entropy
 */

import type { Label, LabeledEntity } from "../contracts/Entity.js";
import { EmptyInputError } from "../contracts/Errors.js";

/**
 * Shannon entropy (base 2) of a distribution given as counts.
 *
 * `H = Σ c·log2(n/c) / n` with `n = Σ c`. A single class yields 0,
 * k equal classes yield log2(k).
 *
 * @param counts - Positive counts, one per class
 * @throws EmptyInputError if `counts` is empty or holds a non-positive count
 */
export function entropy(counts: Iterable<number>): number {
    const values = Array.from(counts);
    if (values.length === 0) {
        throw new EmptyInputError("entropy");
    }

    let total = 0;
    for (const count of values) {
        if (!(count > 0)) {
            throw new EmptyInputError(`entropy (got count ${count})`);
        }
        total += count;
    }

    let sum = 0;
    for (const count of values) {
        sum += count * Math.log2(total / count);
    }
    return sum / total;
}

/**
 * Count entities per label, keyed in first-seen order.
 *
 * @throws EmptyInputError on an empty set
 */
export function labelCounts(entities: readonly LabeledEntity[]): Map<Label, number> {
    if (entities.length === 0) {
        throw new EmptyInputError("labelCounts");
    }

    const counts = new Map<Label, number>();
    for (const entity of entities) {
        counts.set(entity.label, (counts.get(entity.label) ?? 0) + 1);
    }
    return counts;
}

/**
 * Entropy of the label distribution of `entities`.
 */
export function datasetEntropy(entities: readonly LabeledEntity[]): number {
    return entropy(labelCounts(entities).values());
}

/**
 * Label with the highest count.
 *
 * Ties go to the label that comes first in the map's iteration order;
 * with `labelCounts()` that is the label seen first.
 *
 * @throws EmptyInputError on an empty map
 */
export function majorityLabel(counts: ReadonlyMap<Label, number>): Label {
    let best: Label | undefined;
    let bestCount = 0;

    for (const [label, count] of counts) {
        if (best === undefined || count > bestCount) {
            best = label;
            bestCount = count;
        }
    }

    if (best === undefined) {
        throw new EmptyInputError("majorityLabel");
    }
    return best;
}

/**
 * Weighted entropy of a partition: Σ |subset|·H(subset) / Σ |subset|.
 * Empty subsets contribute nothing.
 */
export function weightedEntropy(subsets: Iterable<readonly LabeledEntity[]>): number {
    let total = 0;
    let sum = 0;

    for (const subset of subsets) {
        if (subset.length === 0) {
            continue;
        }
        total += subset.length;
        sum += subset.length * datasetEntropy(subset);
    }

    if (total === 0) {
        throw new EmptyInputError("weightedEntropy");
    }
    return sum / total;
}
