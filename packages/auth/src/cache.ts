/**
 * In-memory shared cache
 *
 * LRU map with per-entry TTL implementing the SharedCache contract.
 * Suitable for a single process and for tests; a multi-instance deployment
 * plugs a distributed cache into the same interface.
 *
 * @module cache
 */

import type { CallOptions, SharedCache } from "./types.ts";

interface CacheEntry {
    value: string;
    expiresAt: number;
}

export interface MemoryCacheOptions {
    /**
     * Maximum number of entries before the least recently used is evicted.
     * @default 10000
     */
    readonly maxSize?: number | undefined;
    /** Clock in milliseconds, for tests */
    readonly now?: (() => number) | undefined;
}

export class MemoryCache implements SharedCache {
    readonly #maxSize: number;
    readonly #now: () => number;
    readonly #entries = new Map<string, CacheEntry>();

    constructor(options: MemoryCacheOptions = {}) {
        const maxSize = options.maxSize ?? 10_000;
        if (!Number.isInteger(maxSize) || maxSize <= 0) {
            throw new RangeError("maxSize must be a positive integer");
        }
        this.#maxSize = maxSize;
        this.#now = options.now ?? Date.now;
    }

    async get(key: string, _options?: CallOptions): Promise<string | undefined> {
        const entry = this.#entries.get(key);
        if (!entry) return undefined;

        if (this.#now() >= entry.expiresAt) {
            this.#entries.delete(key);
            return undefined;
        }

        // Move to end (most recently used)
        this.#entries.delete(key);
        this.#entries.set(key, entry);
        return entry.value;
    }

    async set(key: string, value: string, ttlSeconds: number, _options?: CallOptions): Promise<void> {
        if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
            throw new RangeError("ttlSeconds must be a positive number");
        }

        // Delete first to update insertion order
        this.#entries.delete(key);

        if (this.#entries.size >= this.#maxSize) {
            const firstKey = this.#entries.keys().next().value;
            if (firstKey !== undefined) {
                this.#entries.delete(firstKey);
            }
        }

        this.#entries.set(key, {
            value,
            expiresAt: this.#now() + ttlSeconds * 1000,
        });
    }

    clear(): void {
        this.#entries.clear();
    }

    get size(): number {
        return this.#entries.size;
    }
}
