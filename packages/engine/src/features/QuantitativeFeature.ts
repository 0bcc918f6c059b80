/**
 * @fileoverview Quantitative Feature
 *
 * Threshold split over a numeric attribute.
 *
 * @module @comment-tree/engine/features/QuantitativeFeature
 */

import type { Label, LabeledEntity } from "../contracts/Entity.js";
import type {
    BranchValue,
    FeatureKind,
    Partition,
    SplitArg,
    SplitResult,
} from "../contracts/Feature.js";
import { entropy, weightedEntropy } from "../metrics/entropy.js";
import { BaseFeature } from "./BaseFeature.js";

/**
 * Branch values a quantitative split produces.
 */
export const QuantitativeBranch = {
    Below    : "lt",
    AtOrAbove: "ge",
    Undefined: "un",
} as const;

export type QuantitativeBranchValue = typeof QuantitativeBranch[keyof typeof QuantitativeBranch];

/**
 * Label counts that can move entities from one side of a cut to the other.
 */
class LabelTally {
    private readonly counts = new Map<Label, number>();
    size = 0;

    add(label: Label): void {
        this.counts.set(label, (this.counts.get(label) ?? 0) + 1);
        this.size++;
    }

    remove(label: Label): void {
        const count = (this.counts.get(label) ?? 0) - 1;
        if (count > 0) {
            this.counts.set(label, count);
        }
        else {
            this.counts.delete(label);
        }
        this.size--;
    }

    entropy(): number {
        return entropy(this.counts.values());
    }
}

/**
 * Splits at the cut between adjacent distinct values that minimizes the
 * weighted entropy of the two sides. The stored threshold is the lowest
 * value above the cut, so `identify()` answers "lt" for values below it
 * and "ge" otherwise.
 *
 * Entities with no numeric value form a separate "un" partition. At least
 * one cut between defined values is required.
 *
 * @example
 * ```typescript
 * const feature = new QuantitativeFeature("deltaLine");
 * const { arg, partitions } = feature.split(entities);
 * feature.identify(arg, entity); // "lt" | "ge" | "un"
 * ```
 */
export class QuantitativeFeature extends BaseFeature {
    readonly kind: FeatureKind = "quantitative";

    constructor(attribute: string) {
        super("QF", attribute);
    }

    /**
     * Numeric value of the attribute. Numeric strings are parsed; blanks,
     * non-numeric text and non-finite numbers count as undefined.
     */
    extract(entity: LabeledEntity): number | undefined {
        const value = this.raw(entity);
        if (value === undefined) {
            return undefined;
        }

        const parsed = typeof value === "number" ? value : value.trim() === "" ? NaN : Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    identify(arg: SplitArg, entity: LabeledEntity): QuantitativeBranchValue {
        const value = this.extract(entity);
        // A non-numeric threshold cannot place any value.
        if (value === undefined || typeof arg !== "number") {
            return QuantitativeBranch.Undefined;
        }
        return value < arg ? QuantitativeBranch.Below : QuantitativeBranch.AtOrAbove;
    }

    isValidArg(arg: SplitArg): boolean {
        return typeof arg === "number" && Number.isFinite(arg);
    }

    split(entities: readonly LabeledEntity[]): SplitResult {
        this.requireSplittable(entities);

        const defined: { entity: LabeledEntity; value: number }[] = [];
        const undefinedGroup: LabeledEntity[] = [];

        for (const entity of entities) {
            const value = this.extract(entity);
            if (value === undefined) {
                undefinedGroup.push(entity);
            }
            else {
                defined.push({ entity, value });
            }
        }

        if (defined.length === 0) {
            throw this.invalid("no entity has a numeric value");
        }

        defined.sort((a, b) => a.value - b.value);

        const below = new LabelTally();
        const above = new LabelTally();
        for (const { entity } of defined) {
            above.add(entity.label);
        }

        const n = defined.length;
        let cut = -1;
        let cutEntropy = Infinity;

        for (let i = 1; i < n; i++) {
            const moved = defined[i - 1];
            above.remove(moved.entity.label);
            below.add(moved.entity.label);

            if (defined[i].value === moved.value) {
                continue;
            }

            const score = (below.size * below.entropy() + above.size * above.entropy()) / n;
            if (cut < 0 || score < cutEntropy) {
                cut = i;
                cutEntropy = score;
            }
        }

        if (cut < 0) {
            throw this.invalid("all numeric values are equal");
        }

        const ordered = defined.map(({ entity }) => entity);
        const partitions: Partition[] = [
            { value: QuantitativeBranch.Below, entities: ordered.slice(0, cut) },
            { value: QuantitativeBranch.AtOrAbove, entities: ordered.slice(cut) },
        ];
        if (undefinedGroup.length > 0) {
            partitions.push({ value: QuantitativeBranch.Undefined, entities: undefinedGroup });
        }

        return {
            entropy: weightedEntropy(partitions.map((p) => p.entities)),
            arg    : defined[cut].value,
            partitions,
        };
    }
}
