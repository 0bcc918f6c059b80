/**
 * @fileoverview Domain barrel exports
 *
 * Comment records, their file provider and the train/test commands.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./providers/index.js";
export * from "./commands/index.js";
