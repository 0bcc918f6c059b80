/**
 * @fileoverview Comment Learner - Main Entry Point
 *
 * Trains a decision tree over comment records, or scores an exported
 * tree against them.
 *
 * ```
 * comment-learner -s cat -m 5 train/*.feats > cat.json
 * comment-learner -s cat -f cat.json test/*.feats
 * ```
 *
 * @module comment-learner
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { createConsoleLogger } from "@comment-tree/engine";

import { runCli } from "./cli/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const status = await runCli(process.argv.slice(2), {
        featuresPath: join(__dirname, "..", "config", "features.yml"),
    });
    process.exitCode = status;
}

main().catch((error: unknown) => {
    createConsoleLogger({ prefix: "comment-learner" }).error("Fatal", {
        error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
});
