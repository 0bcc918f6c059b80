/**
 * @fileoverview Feature Registry
 *
 * Ordered name → feature mapping handed to the builder, the codec and
 * the evaluator. Registration order is the builder's tie-break order.
 *
 * @module @comment-tree/engine/features/FeatureRegistry
 */

import { DuplicateFeatureError } from "../contracts/Errors.js";
import type { Feature } from "../contracts/Feature.js";
import { DiscreteFeature, IndexedDiscreteFeature } from "./DiscreteFeature.js";
import { IndexedMembershipFeature, MembershipFeature } from "./MembershipFeature.js";
import { QuantitativeFeature } from "./QuantitativeFeature.js";

/**
 * Declarative description of a feature, as found in configuration files.
 */
export type FeatureSpec =
    | { readonly kind: "discrete"; readonly attribute: string }
    | { readonly kind: "discrete-indexed"; readonly attribute: string; readonly index?: number }
    | { readonly kind: "membership"; readonly attribute: string }
    | { readonly kind: "membership-indexed"; readonly attribute: string; readonly size?: number }
    | { readonly kind: "quantitative"; readonly attribute: string };

/**
 * Instantiate the feature a spec describes.
 */
export function createFeature(spec: FeatureSpec): Feature {
    switch (spec.kind) {
        case "discrete":
            return new DiscreteFeature(spec.attribute);
        case "discrete-indexed":
            return new IndexedDiscreteFeature(spec.attribute, spec.index);
        case "membership":
            return new MembershipFeature(spec.attribute);
        case "membership-indexed":
            return new IndexedMembershipFeature(spec.attribute, spec.size);
        case "quantitative":
            return new QuantitativeFeature(spec.attribute);
    }
}

/**
 * Registry of features, keyed by `Feature.name`.
 *
 * Populate it once, then share it read-only. Iteration follows
 * registration order.
 *
 * @example
 * ```typescript
 * const registry = new FeatureRegistry()
 *     .register(new DiscreteFeature("type"))
 *     .register(new MembershipFeature("posTags"));
 *
 * registry.get("MF:posTags"); // MembershipFeature
 * ```
 */
export class FeatureRegistry implements Iterable<Feature> {
    private readonly features: Map<string, Feature> = new Map();

    /**
     * Build a registry from specs, in order.
     */
    static fromSpecs(specs: readonly FeatureSpec[]): FeatureRegistry {
        const registry = new FeatureRegistry();
        for (const spec of specs) {
            registry.register(createFeature(spec));
        }
        return registry;
    }

    /**
     * Register a feature.
     *
     * @throws DuplicateFeatureError if a feature with the same name exists
     */
    register(feature: Feature): this {
        if (this.features.has(feature.name)) {
            throw new DuplicateFeatureError(feature.name);
        }
        this.features.set(feature.name, feature);
        return this;
    }

    get(name: string): Feature | undefined {
        return this.features.get(name);
    }

    has(name: string): boolean {
        return this.features.has(name);
    }

    get size(): number {
        return this.features.size;
    }

    /** Feature names in registration order */
    names(): string[] {
        return Array.from(this.features.keys());
    }

    [Symbol.iterator](): Iterator<Feature> {
        return this.features.values();
    }
}
