/**
 * @fileoverview Membership Features
 *
 * Treat a comma-delimited attribute as a set of tokens and split on
 * whether an entity's set contains the single most informative token.
 *
 * @module @comment-tree/engine/features/MembershipFeature
 */

import type { LabeledEntity } from "../contracts/Entity.js";
import type {
    BranchValue,
    FeatureKind,
    SplitArg,
    SplitResult,
} from "../contracts/Feature.js";
import { weightedEntropy } from "../metrics/entropy.js";
import { BaseFeature, tokenize } from "./BaseFeature.js";

/**
 * Binary split: `true` for entities holding the chosen token, `false`
 * for the rest.
 *
 * Candidates are the distinct tokens in first-seen order. A token every
 * entity holds is skipped. The first token with the strictly lowest
 * weighted entropy wins.
 *
 * @example
 * ```typescript
 * const feature = new MembershipFeature("posTags");
 * feature.name; // "MF:posTags"
 * ```
 */
export class MembershipFeature extends BaseFeature {
    readonly kind: FeatureKind = "membership";

    constructor(attribute: string, prefix = "MF") {
        super(prefix, attribute);
    }

    extract(entity: LabeledEntity): string[] {
        return tokenize(this.raw(entity));
    }

    identify(arg: SplitArg, entity: LabeledEntity): BranchValue {
        return typeof arg === "string" && this.extract(entity).includes(arg);
    }

    isValidArg(arg: SplitArg): boolean {
        return typeof arg === "string";
    }

    split(entities: readonly LabeledEntity[]): SplitResult {
        this.requireSplittable(entities);

        const candidates = new Set<string>();
        const tokenSets = entities.map((entity) => {
            const tokens = new Set(this.extract(entity));
            for (const token of tokens) {
                candidates.add(token);
            }
            return tokens;
        });

        let best: {
            token: string;
            entropy: number;
            inside: LabeledEntity[];
            outside: LabeledEntity[];
        } | undefined;

        for (const token of candidates) {
            const inside: LabeledEntity[] = [];
            const outside: LabeledEntity[] = [];
            entities.forEach((entity, i) => {
                (tokenSets[i].has(token) ? inside : outside).push(entity);
            });

            if (outside.length === 0) {
                continue;
            }

            const score = weightedEntropy([inside, outside]);
            if (best === undefined || score < best.entropy) {
                best = { token, entropy: score, inside, outside };
            }
        }

        if (best === undefined) {
            throw this.invalid("no token separates the set");
        }

        return {
            entropy   : best.entropy,
            arg       : best.token,
            partitions: [
                { value: true, entities: best.inside },
                { value: false, entities: best.outside },
            ],
        };
    }
}

/**
 * Membership feature restricted to the first `size` tokens.
 *
 * @example
 * ```typescript
 * const feature = new IndexedMembershipFeature("rightTypes", 1);
 * feature.name; // "MF1:rightTypes"
 * ```
 */
export class IndexedMembershipFeature extends MembershipFeature {
    override readonly kind: FeatureKind = "membership-indexed";
    readonly size: number;

    constructor(attribute: string, size = 1) {
        super(attribute, `MF${size}`);
        this.size = size;
    }

    override extract(entity: LabeledEntity): string[] {
        return super.extract(entity).slice(0, this.size);
    }
}
