import type { CacheSettings } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { connectDB, disconnectDB, getCollection } from './db.js';
import { FileCacheStore } from './file-cache.js';
import { MemoryCacheStore } from './memory-cache.js';
import { MongoCacheStore, type CacheDocument } from './mongo-cache.js';
import type { CacheStore } from './cache-store.js';

export * from './cache-store.js';
export { cacheKey, normalizeUrl } from './cache-key.js';
export { FileCacheStore } from './file-cache.js';
export { MemoryCacheStore } from './memory-cache.js';
export { MongoCacheStore } from './mongo-cache.js';

/**
 * Opens the configured backend. `none` still returns a store (in memory) so
 * the cache administration routes keep working; runs skip it via `useCache`.
 */
export async function openCacheStore(settings: CacheSettings): Promise<CacheStore> {
    switch (settings.backend) {
        case 'file':
            return new FileCacheStore({ dir: settings.dir, defaultTtlMs: settings.articleTtlMs });
        case 'memory':
        case 'none':
            return new MemoryCacheStore({ defaultTtlMs: settings.articleTtlMs });
        case 'mongo': {
            if (!settings.mongo.uri) {
                throw new ConfigurationError('MONGODB_URI is required for the mongo cache backend');
            }
            await connectDB(settings.mongo.uri, settings.mongo.dbName);
            const store = new MongoCacheStore({
                collection: getCollection<CacheDocument>(settings.mongo.collection),
                defaultTtlMs: settings.articleTtlMs,
                onClose: disconnectDB,
            });
            await store.ensureIndexes();
            return store;
        }
    }
}
