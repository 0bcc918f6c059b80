/**
 * @fileoverview Feature Set Loader
 *
 * Loads named feature sets from YAML configuration files.
 *
 * @module config/loadFeatures
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { EngineLogger, FeatureSpec } from "@comment-tree/engine";

/**
 * Named feature sets, each an ordered list of feature specs
 */
export type FeatureSets = Record<string, FeatureSpec[]>;

const attribute = z.string().min(1);

const FeatureSpecSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("discrete"), attribute }).strict(),
    z.object({ kind: z.literal("discrete-indexed"), attribute, index: z.number().int().min(0).optional() }).strict(),
    z.object({ kind: z.literal("membership"), attribute }).strict(),
    z.object({ kind: z.literal("membership-indexed"), attribute, size: z.number().int().min(1).optional() }).strict(),
    z.object({ kind: z.literal("quantitative"), attribute }).strict(),
]);

/**
 * YAML file structure
 */
const FeaturesYamlSchema = z.object({
    featureSets: z.record(z.string(), z.array(FeatureSpecSchema).min(1)),
});

/**
 * Load feature sets from a YAML file.
 *
 * @param filePath - Path to the features.yml file
 * @returns Feature sets keyed by name
 * @throws Error if file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const sets = loadFeatureSets("./config/features.yml");
 * console.log(sets.cat[0]);
 * // { kind: "discrete", attribute: "type" }
 * ```
 */
export function loadFeatureSets(filePath: string): FeatureSets {
    if (!existsSync(filePath)) {
        throw new Error(`Feature configuration file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed = FeaturesYamlSchema.safeParse(parseYaml(content));

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid feature configuration at '${issue.path.join(".")}': ${issue.message}`);
    }

    return parsed.data.featureSets;
}

/**
 * Load feature sets with fallback to the built-in sets.
 *
 * @param filePath - Path to the features.yml file
 * @param logger - Receives a warning when the fallback is used
 * @returns Feature sets keyed by name
 */
export function loadFeatureSetsWithFallback(filePath: string, logger: EngineLogger): FeatureSets {
    try {
        return loadFeatureSets(filePath);
    }
    catch (error) {
        logger.warn(`Failed to load feature sets from ${filePath}; using defaults`, {
            error: error instanceof Error ? error.message : String(error),
        });
        return getDefaultFeatureSets();
    }
}

/**
 * Pick one feature set by name.
 *
 * @throws Error naming the available sets if `name` is unknown
 */
export function selectFeatureSet(sets: FeatureSets, name: string): FeatureSpec[] {
    const specs = sets[name];
    if (!specs) {
        throw new Error(`Unknown feature set '${name}' (available: ${Object.keys(sets).join(", ")})`);
    }
    return specs;
}

/**
 * Indexed discrete, first-token membership and full membership on one
 * multi-valued attribute.
 */
function tokenFeatures(attribute: string): FeatureSpec[] {
    return [
        { kind: "discrete-indexed", attribute, index: 0 },
        { kind: "membership-indexed", attribute, size: 1 },
        { kind: "membership", attribute },
    ];
}

/**
 * Get the built-in feature sets.
 *
 * `cat` classifies comments by category from their syntactic context.
 * `target` locates the code a comment refers to from position deltas.
 */
export function getDefaultFeatureSets(): FeatureSets {
    return {
        cat: [
            { kind: "discrete", attribute: "type" },
            ...tokenFeatures("parentTypes"),
            ...tokenFeatures("leftTypes"),
            { kind: "discrete", attribute: "codeLike" },
            { kind: "discrete", attribute: "empty" },
            ...tokenFeatures("posTags"),
        ],
        target: [
            { kind: "quantitative", attribute: "deltaLine" },
            { kind: "quantitative", attribute: "deltaCols" },
            { kind: "quantitative", attribute: "deltaLeft" },
            { kind: "quantitative", attribute: "deltaRight" },
            ...tokenFeatures("rightTypes"),
            { kind: "membership-indexed", attribute: "words", size: 1 },
        ],
    };
}
