/**
 * @fileoverview Discrete Features
 *
 * Group entities by the exact value of an attribute, or by one comma
 * token of it.
 *
 * @module @comment-tree/engine/features/DiscreteFeature
 */

import type { AttributeValue, LabeledEntity } from "../contracts/Entity.js";
import type {
    BranchValue,
    FeatureKind,
    Partition,
    SplitArg,
    SplitResult,
} from "../contracts/Feature.js";
import { weightedEntropy } from "../metrics/entropy.js";
import { BaseFeature, tokenize } from "./BaseFeature.js";

/**
 * One branch per distinct value. Entities without the attribute, or
 * with a non-finite number, share the `null` branch.
 *
 * @example
 * ```typescript
 * const feature = new DiscreteFeature("type");
 * feature.name; // "DF:type"
 * ```
 */
export class DiscreteFeature extends BaseFeature {
    readonly kind: FeatureKind = "discrete";

    constructor(attribute: string, prefix = "DF") {
        super(prefix, attribute);
    }

    extract(entity: LabeledEntity): AttributeValue | undefined {
        const value = this.raw(entity);
        if (typeof value === "number" && !Number.isFinite(value)) {
            return undefined;
        }
        return value;
    }

    identify(_arg: SplitArg, entity: LabeledEntity): BranchValue {
        return this.extract(entity) ?? null;
    }

    isValidArg(arg: SplitArg): boolean {
        return arg === null;
    }

    split(entities: readonly LabeledEntity[]): SplitResult {
        this.requireSplittable(entities);

        const groups = new Map<BranchValue, LabeledEntity[]>();
        for (const entity of entities) {
            const value = this.identify(null, entity);
            const group = groups.get(value);
            if (group) {
                group.push(entity);
            }
            else {
                groups.set(value, [entity]);
            }
        }

        if (groups.size < 2) {
            throw this.invalid("every entity has the same value");
        }

        const partitions: Partition[] = Array.from(groups, ([value, members]) => ({
            value,
            entities: members,
        }));

        return {
            entropy: weightedEntropy(groups.values()),
            arg    : null,
            partitions,
        };
    }
}

/**
 * Discrete feature over the `index`-th comma token of an attribute.
 * Entities with too few tokens fall into the `null` branch.
 *
 * @example
 * ```typescript
 * const feature = new IndexedDiscreteFeature("parentTypes", 0);
 * feature.name; // "DF0:parentTypes"
 * ```
 */
export class IndexedDiscreteFeature extends DiscreteFeature {
    override readonly kind: FeatureKind = "discrete-indexed";
    readonly index: number;

    constructor(attribute: string, index = 0) {
        super(attribute, `DF${index}`);
        this.index = index;
    }

    override extract(entity: LabeledEntity): string | undefined {
        const tokens = tokenize(this.raw(entity));
        return this.index < tokens.length ? tokens[this.index] : undefined;
    }
}
