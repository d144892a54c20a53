import { z } from 'zod';
import { ArticleSchema, type Article } from '../models/article.js';
import { cacheKey, normalizeUrl } from './cache-key.js';

export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours

export type CachePayload =
    | { kind: 'html'; html: string }
    | { kind: 'article'; article: Article };

export interface CacheEntry {
    key: string;
    url: string;
    payload: CachePayload;
    storedAt: number;
    ttlMs: number;
}

// Expired entries stay in the store until clear() or sweep().
export type CacheLookup =
    | { status: 'miss' }
    | { status: 'hit'; entry: CacheEntry }
    | { status: 'expired'; entry: CacheEntry };

export interface CacheStats {
    entryCount: number;
    expiredCount: number;
    totalSize: number;
    oldestEntry: string | null;
}

export interface CacheStore {
    get(url: string): Promise<CacheLookup>;
    put(url: string, payload: CachePayload, ttlMs?: number): Promise<void>;
    // Returns the number of entries removed.
    clear(): Promise<number>;
    // Removes expired and unreadable entries; returns how many.
    sweep(): Promise<number>;
    stats(): Promise<CacheStats>;
    close(): Promise<void>;
}

const CachePayloadSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('html'), html: z.string() }),
    z.object({ kind: z.literal('article'), article: ArticleSchema }),
]);

const CacheEntrySchema = z.object({
    key: z.string().min(1),
    url: z.string(),
    payload: CachePayloadSchema,
    storedAt: z.number().finite(),
    ttlMs: z.number().nonnegative(),
});

export function createEntry(url: string, payload: CachePayload, ttlMs: number, now: number): CacheEntry {
    return {
        key: cacheKey(url),
        url: normalizeUrl(url),
        payload,
        storedAt: now,
        ttlMs,
    };
}

export function serializeEntry(entry: CacheEntry): string {
    return JSON.stringify(entry);
}

// null for anything that is not a complete, well-typed entry.
export function parseEntry(raw: string): CacheEntry | null {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        return null;
    }

    const parsed = CacheEntrySchema.safeParse(data);
    if (!parsed.success) return null;

    const { payload } = parsed.data;
    return {
        ...parsed.data,
        payload: payload.kind === 'article'
            ? { kind: 'article', article: Object.freeze(payload.article) }
            : payload,
    };
}

export function isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.storedAt >= entry.ttlMs;
}

export function lookup(entry: CacheEntry | null, now: number): CacheLookup {
    if (!entry) return { status: 'miss' };
    return isExpired(entry, now) ? { status: 'expired', entry } : { status: 'hit', entry };
}
