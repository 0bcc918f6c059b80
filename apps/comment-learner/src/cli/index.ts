/**
 * @fileoverview CLI barrel exports
 *
 * @module cli
 */

export { parseCliOptions, UsageError, kUSAGE, type CliOptions } from "./options.js";
export { runCli, type CliDependencies } from "./run.js";
