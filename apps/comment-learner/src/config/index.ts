/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadFeatureSets,
    loadFeatureSetsWithFallback,
    selectFeatureSet,
    getDefaultFeatureSets,
    type FeatureSets,
} from "./loadFeatures.js";
export { loadEnvSettings, type EnvSettings } from "./settings.js";
