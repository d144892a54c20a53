import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CacheError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';
import { cacheKey } from './cache-key.js';
import {
    DEFAULT_TTL_MS,
    createEntry,
    isExpired,
    lookup,
    parseEntry,
    serializeEntry,
    type CacheEntry,
    type CacheLookup,
    type CachePayload,
    type CacheStats,
    type CacheStore,
} from './cache-store.js';

const log = createLogger('Cache');

const ENTRY_SUFFIX = '.json';
const TEMP_SUFFIX = '.tmp';

export interface FileCacheOptions {
    dir: string;
    defaultTtlMs?: number;
    now?: () => number;
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON file per normalized URL, named by its SHA-256 key. Writes go to a
 * temp file in the same directory and are renamed into place, so an
 * interrupted write never leaves a half-written entry behind.
 */
export class FileCacheStore implements CacheStore {
    private readonly dir: string;
    private readonly defaultTtlMs: number;
    private readonly now: () => number;

    constructor(options: FileCacheOptions) {
        this.dir = options.dir;
        this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
        this.now = options.now ?? Date.now;
    }

    entryPath(url: string): string {
        return join(this.dir, `${cacheKey(url)}${ENTRY_SUFFIX}`);
    }

    async get(url: string): Promise<CacheLookup> {
        let raw: string;
        try {
            raw = await readFile(this.entryPath(url), 'utf-8');
        } catch (err) {
            if (!isMissingFile(err)) {
                log.warn(`Failed to read cache entry for ${url}: ${errorMessage(err)}`);
            }
            return { status: 'miss' };
        }

        const entry = parseEntry(raw);
        if (!entry) {
            log.warn(`Corrupt cache entry for ${url}, treating as miss`);
            return { status: 'miss' };
        }

        const result = lookup(entry, this.now());
        log.debug(`${result.status} ${url}`);
        return result;
    }

    async put(url: string, payload: CachePayload, ttlMs: number = this.defaultTtlMs): Promise<void> {
        const entry = createEntry(url, payload, ttlMs, this.now());
        const target = join(this.dir, `${entry.key}${ENTRY_SUFFIX}`);
        const temp = join(this.dir, `.${entry.key}.${process.pid}.${randomUUID()}${TEMP_SUFFIX}`);

        try {
            await mkdir(this.dir, { recursive: true });
            await writeFile(temp, serializeEntry(entry), 'utf-8');
            await rename(temp, target);
        } catch (err) {
            await rm(temp, { force: true });
            throw new CacheError(`Failed to write cache entry for ${url}: ${errorMessage(err)}`, { cause: err });
        }
    }

    async clear(): Promise<number> {
        let cleared = 0;
        for (const name of await this.listFiles()) {
            await rm(join(this.dir, name), { force: true });
            if (name.endsWith(ENTRY_SUFFIX)) cleared++;
        }
        log.info(`Cleared ${cleared} cached entries`);
        return cleared;
    }

    async sweep(): Promise<number> {
        const now = this.now();
        let removed = 0;
        for (const name of await this.entryFiles()) {
            const entry = await this.readEntry(name);
            if (!entry || isExpired(entry, now)) {
                await rm(join(this.dir, name), { force: true });
                removed++;
            }
        }
        log.info(`Swept ${removed} expired or unreadable entries`);
        return removed;
    }

    async stats(): Promise<CacheStats> {
        const now = this.now();
        const files = await this.entryFiles();
        let expiredCount = 0;
        let totalSize = 0;
        let oldest: number | null = null;

        for (const name of files) {
            try {
                totalSize += (await stat(join(this.dir, name))).size;
            } catch (err) {
                log.debug(`Could not stat ${name}: ${errorMessage(err)}`);
            }

            const entry = await this.readEntry(name);
            if (!entry || isExpired(entry, now)) expiredCount++;
            if (entry && (oldest === null || entry.storedAt < oldest)) oldest = entry.storedAt;
        }

        return {
            entryCount: files.length,
            expiredCount,
            totalSize,
            oldestEntry: oldest === null ? null : new Date(oldest).toISOString(),
        };
    }

    async close(): Promise<void> {
        // entries are flushed on every put
    }

    private async listFiles(): Promise<string[]> {
        try {
            const names = await readdir(this.dir);
            return names.filter((name) => name.endsWith(ENTRY_SUFFIX) || name.endsWith(TEMP_SUFFIX));
        } catch (err) {
            if (isMissingFile(err)) return [];
            throw new CacheError(`Failed to list cache directory ${this.dir}: ${errorMessage(err)}`, { cause: err });
        }
    }

    private async entryFiles(): Promise<string[]> {
        return (await this.listFiles()).filter((name) => name.endsWith(ENTRY_SUFFIX));
    }

    private async readEntry(name: string): Promise<CacheEntry | null> {
        try {
            return parseEntry(await readFile(join(this.dir, name), 'utf-8'));
        } catch {
            return null;
        }
    }
}
