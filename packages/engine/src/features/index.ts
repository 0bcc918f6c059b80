/**
 * @fileoverview Feature barrel exports
 *
 * @module @comment-tree/engine/features
 */

export { BaseFeature, tokenize, kTOKEN_SEPARATOR } from "./BaseFeature.js";
export { DiscreteFeature, IndexedDiscreteFeature } from "./DiscreteFeature.js";
export { MembershipFeature, IndexedMembershipFeature } from "./MembershipFeature.js";
export {
    QuantitativeFeature,
    QuantitativeBranch,
    type QuantitativeBranchValue,
} from "./QuantitativeFeature.js";
export {
    FeatureRegistry,
    createFeature,
    type FeatureSpec,
} from "./FeatureRegistry.js";
