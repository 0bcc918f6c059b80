/**
 * EntityProvider Contract
 *
 * Entity providers are passive data sources. Training and scoring pull a
 * finite, fully materialized set of entities from a provider before the
 * engine runs; the engine itself never streams.
 *
 * Design principles:
 * - Passive: Providers don't push; callers pull
 * - Materialized: a fetch returns complete entities, derived attributes included
 * - May page: Providers can return a cursor and `hasMore`
 */

import type { LabeledEntity } from "./Entity.js";

/**
 * Options for fetching entities.
 */
export interface FetchOptions {
    /** Maximum number of entities to fetch */
    readonly limit?: number;

    /** Fetch entities after this cursor */
    readonly since?: string;

    /** Additional provider-specific options */
    readonly [key: string]: unknown;
}

/**
 * Result of fetching entities.
 */
export interface FetchResult<T extends LabeledEntity = LabeledEntity> {
    /** Entities fetched */
    readonly entities: readonly T[];

    /** Cursor for next fetch (provider-specific) */
    readonly cursor?: string;

    /** Whether there are more entities available */
    readonly hasMore: boolean;
}

/**
 * EntityProvider interface.
 *
 * Providers are responsible for:
 * - Reading raw records (files, databases, APIs)
 * - Converting them to labeled entities
 * - Tracking what has been read (cursor management)
 *
 * @example
 * ```typescript
 * class ArrayProvider implements EntityProvider {
 *     readonly id = "array-provider";
 *     readonly name = "Array Provider";
 *
 *     constructor(private readonly items: LabeledEntity[]) {}
 *
 *     async getEntities(options?: FetchOptions) {
 *         const start = Number(options?.since ?? 0);
 *         const end = start + (options?.limit ?? this.items.length);
 *         return {
 *             entities: this.items.slice(start, end),
 *             cursor  : String(end),
 *             hasMore : end < this.items.length,
 *         };
 *     }
 * }
 * ```
 */
export interface EntityProvider<T extends LabeledEntity = LabeledEntity> {
    /** Unique identifier for this provider */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Optional description */
    readonly description?: string;

    /**
     * Prepare the provider (open files, connect).
     */
    initialize?(): Promise<void>;

    /**
     * Fetch entities from the data source.
     *
     * @param options - Fetch options (limit, since, etc.)
     * @returns Fetch result with entities and cursor
     */
    getEntities(options?: FetchOptions): Promise<FetchResult<T>>;

    /**
     * Release any resources held by the provider.
     */
    shutdown?(): Promise<void>;
}

/**
 * Pull every entity from a provider, following cursors until `hasMore`
 * is false.
 *
 * @param provider - The provider to drain
 * @param pageSize - Optional page size passed as `limit`
 * @returns All entities, in provider order
 */
export async function collectEntities<T extends LabeledEntity>(
    provider: EntityProvider<T>,
    pageSize?: number
): Promise<T[]> {
    const entities: T[] = [];
    let cursor: string | undefined;

    for (;;) {
        const result = await provider.getEntities({ limit: pageSize, since: cursor });
        entities.push(...result.entities);

        if (!result.hasMore) {
            return entities;
        }
        if (result.cursor === undefined || result.cursor === cursor) {
            throw new Error(`Provider ${provider.id} reported more entities without advancing its cursor`);
        }
        cursor = result.cursor;
    }
}
