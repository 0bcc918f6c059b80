/**
 * @fileoverview Entity providers barrel exports
 *
 * @module domain/providers
 */

export {
    FeatsFileEntityProvider,
    FeatsLineSchema,
    parseFeatsText,
    type FeatsFileProviderConfig,
} from "./FeatsFileEntityProvider.js";
