/**
 * @fileoverview Environment settings
 *
 * Reads builder and logging defaults from the environment. `.env` is
 * loaded by the entry point through `dotenv/config`.
 *
 * @module config/settings
 */

import { z } from "zod";
import type { LogLevel } from "@comment-tree/engine";

/**
 * Settings taken from the environment; CLI flags override them.
 */
export interface EnvSettings {
    minEntities?: number;
    minEntropy?: number;
    logLevel: LogLevel;
}

const blankAsUndefined = (value: unknown): unknown =>
    typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
    COMMENT_TREE_MIN_ENTITIES: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).optional()),
    COMMENT_TREE_MIN_ENTROPY : z.preprocess(blankAsUndefined, z.coerce.number().min(0).optional()),
    COMMENT_TREE_LOG_LEVEL   : z.preprocess(
        blankAsUndefined,
        z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
    ),
});

/**
 * Read settings from an environment map.
 *
 * @param env - Environment variables (default: `process.env`)
 * @throws Error naming the variable when a value is malformed
 */
export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
    }

    return {
        minEntities: parsed.data.COMMENT_TREE_MIN_ENTITIES,
        minEntropy : parsed.data.COMMENT_TREE_MIN_ENTROPY,
        logLevel   : parsed.data.COMMENT_TREE_LOG_LEVEL,
    };
}
