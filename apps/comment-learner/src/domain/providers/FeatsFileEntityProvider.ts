/**
 * @fileoverview Feats File Entity Provider
 *
 * Implements the EntityProvider contract over `.feats` files: JSON Lines
 * where each line maps attribute names to a string, a number or null.
 * Blank lines and lines starting with `#` are skipped.
 *
 * @module domain/providers/FeatsFileEntityProvider
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import type {
    EntityProvider,
    EngineLogger,
    FetchOptions,
    FetchResult,
    LabeledEntity,
} from "@comment-tree/engine";
import { createConsoleLogger } from "@comment-tree/engine";
import { createCommentRecord, type RawCommentRecord } from "../entities/CommentRecord.js";

/**
 * Shape of one `.feats` line
 */
export const FeatsLineSchema = z.record(z.string(), z.union([z.string(), z.number(), z.null()]));

/**
 * Configuration for the feats file provider
 */
export interface FeatsFileProviderConfig {
    /** Files to read, in order */
    files: readonly string[];

    /** Attribute holding the classification label (default: "key") */
    labelAttribute?: string;

    /** Logger (default: console at info) */
    logger?: EngineLogger;
}

/**
 * Parse the text of one `.feats` file into raw records.
 *
 * @param text - File contents
 * @param source - File name used in error messages
 * @returns Records paired with their 1-based line numbers
 * @throws Error naming the file and line of the first bad line
 */
export function parseFeatsText(text: string, source: string): { line: number; record: RawCommentRecord }[] {
    const records: { line: number; record: RawCommentRecord }[] = [];

    text.split(/\r?\n/).forEach((content, index) => {
        const trimmed = content.trim();
        if (trimmed === "" || trimmed.startsWith("#")) {
            return;
        }

        const line = index + 1;
        let data: unknown;
        try {
            data = JSON.parse(trimmed);
        }
        catch (error) {
            throw new Error(`${source}:${line}: invalid JSON (${error instanceof Error ? error.message : String(error)})`);
        }

        const parsed = FeatsLineSchema.safeParse(data);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : "";
            throw new Error(`${source}:${line}: invalid record${where}: ${issue.message}`);
        }

        records.push({ line, record: parsed.data });
    });

    return records;
}

/**
 * Feats File Entity Provider
 *
 * Reads every configured file once, on the first fetch, and pages over
 * the materialized records with a numeric offset cursor.
 *
 * @example
 * ```typescript
 * const provider = new FeatsFileEntityProvider({
 *     files         : ["train/a.feats", "train/b.feats"],
 *     labelAttribute: "key",
 * });
 *
 * const entities = await collectEntities(provider);
 * ```
 */
export class FeatsFileEntityProvider implements EntityProvider {
    readonly id = "feats-file-provider";
    readonly name = "Feats File Provider";
    readonly description = "Provides comment records from JSON Lines .feats files";

    private config: {
        files: readonly string[];
        labelAttribute?: string;
        logger: EngineLogger;
    };
    private entities: LabeledEntity[] | null = null;

    constructor(config: FeatsFileProviderConfig) {
        this.config = {
            files         : config.files,
            labelAttribute: config.labelAttribute,
            logger        : config.logger ?? createConsoleLogger({ prefix: "feats" }),
        };
    }

    /**
     * Read and convert every file.
     */
    async initialize(): Promise<void> {
        if (this.entities) {
            return;
        }

        const entities: LabeledEntity[] = [];
        for (const file of this.config.files) {
            const text = await readFile(file, "utf-8");
            const records = parseFeatsText(text, file);

            for (const { line, record } of records) {
                entities.push(createCommentRecord(`${file}:${line}`, record, {
                    labelAttribute: this.config.labelAttribute,
                }));
            }

            this.config.logger.debug(`Read ${file}`, { records: records.length });
        }

        this.config.logger.info("Loaded comment records", {
            files   : this.config.files.length,
            entities: entities.length,
        });
        this.entities = entities;
    }

    /**
     * Fetch records, starting at the offset in `since`.
     *
     * @param options - Fetch options (limit, since)
     * @returns Fetch result with labeled entities
     */
    async getEntities(options: FetchOptions = {}): Promise<FetchResult> {
        await this.initialize();
        const all = this.entities ?? [];

        const start = options.since ? Number.parseInt(options.since, 10) : 0;
        if (!Number.isInteger(start) || start < 0) {
            throw new Error(`Invalid cursor: ${options.since}`);
        }

        const end = Math.min(all.length, start + (options.limit ?? all.length));

        return {
            entities: all.slice(start, end),
            cursor  : String(end),
            hasMore : end < all.length,
        };
    }

    /**
     * Drop the materialized records.
     */
    async shutdown(): Promise<void> {
        this.entities = null;
    }
}
