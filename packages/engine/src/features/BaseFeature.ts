/**
 * @fileoverview Base Feature
 *
 * Shared plumbing for the feature variants: naming, raw attribute access,
 * comma tokenization and the minimum-size guard every split applies.
 *
 * @module @comment-tree/engine/features/BaseFeature
 */

import type { AttributeValue, LabeledEntity } from "../contracts/Entity.js";
import { InvalidSplitError } from "../contracts/Errors.js";
import type {
    BranchValue,
    Feature,
    FeatureKind,
    SplitArg,
    SplitResult,
} from "../contracts/Feature.js";

/**
 * Separator of multi-valued attributes.
 */
export const kTOKEN_SEPARATOR = ",";

/**
 * Split a raw attribute into its comma tokens.
 * An absent attribute has no tokens; an empty string has one empty token.
 */
export function tokenize(value: AttributeValue | undefined): string[] {
    if (value === undefined) {
        return [];
    }
    return String(value).split(kTOKEN_SEPARATOR);
}

export abstract class BaseFeature implements Feature {
    readonly name: string;
    readonly attribute: string;
    abstract readonly kind: FeatureKind;

    /**
     * @param prefix - Variant discriminator, e.g. "DF", "MF1", "QF"
     * @param attribute - Attribute the feature reads
     */
    protected constructor(prefix: string, attribute: string) {
        this.name = `${prefix}:${attribute}`;
        this.attribute = attribute;
    }

    abstract extract(entity: LabeledEntity): unknown;

    abstract split(entities: readonly LabeledEntity[]): SplitResult;

    abstract identify(arg: SplitArg, entity: LabeledEntity): BranchValue;

    abstract isValidArg(arg: SplitArg): boolean;

    /**
     * Raw attribute value as the entity holds it.
     */
    protected raw(entity: LabeledEntity): AttributeValue | undefined {
        return entity.get(this.attribute);
    }

    /**
     * Reject sets too small to split.
     */
    protected requireSplittable(entities: readonly LabeledEntity[]): void {
        if (entities.length < 2) {
            throw this.invalid(`needs at least 2 entities, got ${entities.length}`);
        }
    }

    protected invalid(reason: string): InvalidSplitError {
        return new InvalidSplitError(this.name, reason);
    }

    toString(): string {
        return `<${this.constructor.name}: ${this.name}>`;
    }
}
