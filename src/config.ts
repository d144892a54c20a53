import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const SITE_IDS = ['prothom-alo', 'ittefaq'] as const;

export type SiteId = (typeof SITE_IDS)[number];

export interface SiteConfig {
    id: SiteId;
    name: string;
    baseUrl: string;
    // Section paths visited after the home page, in order.
    sections: string[];
}

export const SITES: Record<SiteId, SiteConfig> = {
    'prothom-alo': {
        id: 'prothom-alo',
        name: 'Prothom Alo',
        baseUrl: 'https://www.prothomalo.com',
        sections: [
            'bangladesh',
            'world',
            'sports',
            'entertainment',
            'business',
            'opinion',
            'politics',
            'lifestyle',
            'tech',
        ],
    },
    ittefaq: {
        id: 'ittefaq',
        name: 'The Daily Ittefaq',
        baseUrl: 'https://www.ittefaq.com.bd',
        sections: [],
    },
};

export function isSiteId(value: string): value is SiteId {
    return (SITE_IDS as readonly string[]).includes(value);
}

export function resolveSite(id: string): SiteConfig {
    if (!isSiteId(id)) {
        throw new ConfigurationError(
            `Unknown site "${id}". Supported sites: ${SITE_IDS.join(', ')}`,
        );
    }
    return SITES[id];
}

// "all" expands to every supported site.
export function resolveSites(ids: string[]): SiteConfig[] {
    if (ids.length === 0) {
        throw new ConfigurationError('No site given');
    }
    const expanded = ids.includes('all') ? [...SITE_IDS] : ids;
    return [...new Set(expanded)].map(resolveSite);
}

/**
 * A limit is a non-negative integer; 0 means "every article the listing pages expose".
 */
export function parseLimit(value: unknown): number {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigurationError(
            `Invalid limit ${JSON.stringify(value)}: expected a non-negative integer`,
        );
    }
    return parsed;
}

export const CACHE_BACKENDS = ['file', 'memory', 'mongo', 'none'] as const;

export type CacheBackend = (typeof CACHE_BACKENDS)[number];

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
    CACHE_BACKEND: z.enum(CACHE_BACKENDS).default('file'),
    CACHE_DIR: z.string().min(1).default('./.cache'),
    CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
    LISTING_CACHE_TTL_MINUTES: z.coerce.number().min(0).default(15),
    MIN_CONTENT_LENGTH: z.coerce.number().int().min(0).default(50),
    OUTPUT_DIR: z.string().min(1).default('./output'),
    MONGODB_URI: z.string().min(1).optional(),
    DB_NAME: z.string().min(1).default('khobor-scraper'),
    MONGO_CACHE_COLLECTION: z.string().min(1).default('cache'),
});

export interface FetchSettings {
    delayMs: number;
    maxAttempts: number;
    timeoutMs: number;
}

export interface CacheSettings {
    backend: CacheBackend;
    dir: string;
    articleTtlMs: number;
    listingTtlMs: number;
    mongo: {
        uri?: string;
        dbName: string;
        collection: string;
    };
}

export interface AppConfig {
    port: number;
    logLevel: LogLevel;
    outputDir: string;
    minContentLength: number;
    fetch: FetchSettings;
    cache: CacheSettings;
}

// Blank values count as unset so `.env` lines like `MONGODB_URI=` fall back to defaults.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            result[key] = value.trim();
        }
    }
    return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
    }

    const vars = parsed.data;
    if (vars.CACHE_BACKEND === 'mongo' && !vars.MONGODB_URI) {
        throw new ConfigurationError('CACHE_BACKEND=mongo requires MONGODB_URI to be set');
    }

    return {
        port: vars.PORT,
        logLevel: vars.LOG_LEVEL,
        outputDir: vars.OUTPUT_DIR,
        minContentLength: vars.MIN_CONTENT_LENGTH,
        fetch: {
            delayMs: vars.REQUEST_DELAY_MS,
            maxAttempts: vars.MAX_RETRIES,
            timeoutMs: vars.REQUEST_TIMEOUT_MS,
        },
        cache: {
            backend: vars.CACHE_BACKEND,
            dir: vars.CACHE_DIR,
            articleTtlMs: Math.round(vars.CACHE_TTL_HOURS * 60 * 60 * 1000),
            listingTtlMs: Math.round(vars.LISTING_CACHE_TTL_MINUTES * 60 * 1000),
            mongo: {
                uri: vars.MONGODB_URI,
                dbName: vars.DB_NAME,
                collection: vars.MONGO_CACHE_COLLECTION,
            },
        },
    };
}
