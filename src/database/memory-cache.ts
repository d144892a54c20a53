import { cacheKey } from './cache-key.js';
import {
    DEFAULT_TTL_MS,
    createEntry,
    isExpired,
    lookup,
    parseEntry,
    serializeEntry,
    type CacheLookup,
    type CachePayload,
    type CacheStats,
    type CacheStore,
} from './cache-store.js';

export interface MemoryCacheOptions {
    defaultTtlMs?: number;
    now?: () => number;
}

/**
 * Keeps serialized entries in a Map, so reads go through the same parsing as
 * the persistent stores. Lost on restart.
 */
export class MemoryCacheStore implements CacheStore {
    private entries = new Map<string, string>();
    private readonly defaultTtlMs: number;
    private readonly now: () => number;

    constructor(options: MemoryCacheOptions = {}) {
        this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
        this.now = options.now ?? Date.now;
    }

    async get(url: string): Promise<CacheLookup> {
        const raw = this.entries.get(cacheKey(url));
        if (raw === undefined) return { status: 'miss' };
        return lookup(parseEntry(raw), this.now());
    }

    async put(url: string, payload: CachePayload, ttlMs: number = this.defaultTtlMs): Promise<void> {
        const entry = createEntry(url, payload, ttlMs, this.now());
        this.entries.set(entry.key, serializeEntry(entry));
    }

    async clear(): Promise<number> {
        const count = this.entries.size;
        this.entries.clear();
        return count;
    }

    async sweep(): Promise<number> {
        const now = this.now();
        let removed = 0;
        for (const [key, raw] of this.entries) {
            const entry = parseEntry(raw);
            if (!entry || isExpired(entry, now)) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    async stats(): Promise<CacheStats> {
        const now = this.now();
        let expiredCount = 0;
        let totalSize = 0;
        let oldest: number | null = null;

        for (const raw of this.entries.values()) {
            totalSize += Buffer.byteLength(raw, 'utf-8');
            const entry = parseEntry(raw);
            if (!entry || isExpired(entry, now)) expiredCount++;
            if (entry && (oldest === null || entry.storedAt < oldest)) oldest = entry.storedAt;
        }

        return {
            entryCount: this.entries.size,
            expiredCount,
            totalSize,
            oldestEntry: oldest === null ? null : new Date(oldest).toISOString(),
        };
    }

    async close(): Promise<void> {
        // nothing to flush
    }
}
