import type { Collection } from 'mongodb';
import { createLogger, errorMessage } from '../logger.js';
import { CacheError } from '../errors.js';
import { cacheKey } from './cache-key.js';
import {
    DEFAULT_TTL_MS,
    createEntry,
    lookup,
    parseEntry,
    serializeEntry,
    type CacheLookup,
    type CachePayload,
    type CacheStats,
    type CacheStore,
} from './cache-store.js';

const log = createLogger('Cache');

export interface CacheDocument {
    _id: string;
    url: string;
    storedAt: number;
    expiresAt: number;
    // The serialized entry; parsed with the same schema as the file store.
    body: string;
}

export interface MongoCacheOptions {
    collection: Collection<CacheDocument>;
    defaultTtlMs?: number;
    now?: () => number;
    // Called by close(), typically disconnectDB.
    onClose?: () => Promise<void>;
}

/**
 * One document per key. `replaceOne` with upsert swaps a whole document at
 * once, which gives the same all-or-nothing writes as the file store.
 */
export class MongoCacheStore implements CacheStore {
    private readonly collection: Collection<CacheDocument>;
    private readonly defaultTtlMs: number;
    private readonly now: () => number;
    private readonly onClose?: () => Promise<void>;

    constructor(options: MongoCacheOptions) {
        this.collection = options.collection;
        this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
        this.now = options.now ?? Date.now;
        this.onClose = options.onClose;
    }

    async ensureIndexes(): Promise<void> {
        await this.collection.createIndex({ expiresAt: 1 });
    }

    async get(url: string): Promise<CacheLookup> {
        let doc: CacheDocument | null;
        try {
            doc = await this.collection.findOne({ _id: cacheKey(url) });
        } catch (err) {
            log.warn(`Failed to read cache entry for ${url}: ${errorMessage(err)}`);
            return { status: 'miss' };
        }
        if (!doc) return { status: 'miss' };

        const entry = parseEntry(doc.body);
        if (!entry) {
            log.warn(`Corrupt cache entry for ${url}, treating as miss`);
            return { status: 'miss' };
        }
        return lookup(entry, this.now());
    }

    async put(url: string, payload: CachePayload, ttlMs: number = this.defaultTtlMs): Promise<void> {
        const entry = createEntry(url, payload, ttlMs, this.now());
        try {
            await this.collection.replaceOne(
                { _id: entry.key },
                {
                    url: entry.url,
                    storedAt: entry.storedAt,
                    expiresAt: entry.storedAt + entry.ttlMs,
                    body: serializeEntry(entry),
                },
                { upsert: true },
            );
        } catch (err) {
            throw new CacheError(`Failed to write cache entry for ${url}: ${errorMessage(err)}`, { cause: err });
        }
    }

    async clear(): Promise<number> {
        const result = await this.collection.deleteMany({});
        log.info(`Cleared ${result.deletedCount} cached entries`);
        return result.deletedCount;
    }

    // Removes expired documents, then any whose body no longer parses.
    async sweep(): Promise<number> {
        const expired = await this.collection.deleteMany({ expiresAt: { $lte: this.now() } });

        const remaining = await this.collection.find({}).toArray();
        const corruptIds = remaining.filter((doc) => !parseEntry(doc.body)).map((doc) => doc._id);
        const corrupt = corruptIds.length > 0
            ? (await this.collection.deleteMany({ _id: { $in: corruptIds } })).deletedCount
            : 0;

        log.info(`Swept ${expired.deletedCount} expired and ${corrupt} unreadable entries`);
        return expired.deletedCount + corrupt;
    }

    async stats(): Promise<CacheStats> {
        const now = this.now();
        const docs = await this.collection.find({}).toArray();
        let expiredCount = 0;
        let totalSize = 0;
        let oldest: number | null = null;

        for (const doc of docs) {
            totalSize += Buffer.byteLength(doc.body, 'utf-8');
            if (doc.expiresAt <= now || !parseEntry(doc.body)) expiredCount++;
            if (oldest === null || doc.storedAt < oldest) oldest = doc.storedAt;
        }

        return {
            entryCount: docs.length,
            expiredCount,
            totalSize,
            oldestEntry: oldest === null ? null : new Date(oldest).toISOString(),
        };
    }

    async close(): Promise<void> {
        if (this.onClose) {
            await this.onClose();
        }
    }
}
