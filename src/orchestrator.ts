import { parseLimit } from './config.js';
import { normalizeUrl } from './database/cache-key.js';
import { DEFAULT_TTL_MS, type CachePayload, type CacheStore } from './database/cache-store.js';
import { ListingUnavailableError } from './errors.js';
import { createLogger, errorMessage, type Logger } from './logger.js';
import { titlePreview } from './models/article.js';
import { DEFAULT_VALIDATION_RULES, validateArticle, type ValidationRules } from './models/validator.js';
import type {
    Article,
    ExtractionOutcome,
    FailureRecord,
    PageFetcher,
    RunStats,
    ScrapeResult,
    SiteExtractor,
} from './types.js';

export const DEFAULT_LISTING_TTL_MS = 15 * 60 * 1000; // 15 minutes

export interface OrchestratorOptions {
    extractor: SiteExtractor;
    fetcher: PageFetcher;
    cache: CacheStore;
    rules?: ValidationRules;
    articleTtlMs?: number;
    listingTtlMs?: number;
    // false skips every cache read and write (CACHE_BACKEND=none).
    useCache?: boolean;
    now?: () => Date;
}

export interface RunOptions {
    signal?: AbortSignal;
}

// Where a candidate's article came from, before validation.
type Resolution =
    | { ok: true; article: Article }
    | { ok: false; failure: FailureRecord };

/**
 * Runs one site: discover candidates from the listing pages, then resolve each
 * through the cache or the network, extract and validate, in discovery order.
 */
export class ScrapeOrchestrator {
    private readonly extractor: SiteExtractor;
    private readonly fetcher: PageFetcher;
    private readonly cache: CacheStore;
    private readonly rules: ValidationRules;
    private readonly articleTtlMs: number;
    private readonly listingTtlMs: number;
    private readonly useCache: boolean;
    private readonly now: () => Date;
    private readonly log: Logger;

    constructor(options: OrchestratorOptions) {
        this.extractor = options.extractor;
        this.fetcher = options.fetcher;
        this.cache = options.cache;
        this.rules = options.rules ?? DEFAULT_VALIDATION_RULES;
        this.articleTtlMs = options.articleTtlMs ?? DEFAULT_TTL_MS;
        this.listingTtlMs = options.listingTtlMs ?? DEFAULT_LISTING_TTL_MS;
        this.useCache = options.useCache ?? true;
        this.now = options.now ?? (() => new Date());
        this.log = createLogger(options.extractor.site.name);
    }

    async run(limit: number, options: RunOptions = {}): Promise<ScrapeResult> {
        const requested = parseLimit(limit);
        const started = this.now();
        const site = this.extractor.site;
        const stats: RunStats = {
            siteId: site.id,
            siteName: site.name,
            requested,
            found: 0,
            validated: 0,
            failed: 0,
            cacheHits: 0,
            networkFetches: 0,
            startedAt: started.toISOString(),
            finishedAt: started.toISOString(),
            durationSeconds: 0,
            cancelled: false,
            failures: [],
        };

        this.log.info(`Scraping ${site.baseUrl} (limit ${requested === 0 ? 'all' : requested})`);

        const candidates = await this.discover(requested, stats);
        stats.found = candidates.length;
        this.log.info(`Found ${candidates.length} candidate articles`);

        const articles: Article[] = [];
        for (const url of candidates) {
            if (requested > 0 && articles.length >= requested) break;
            if (options.signal?.aborted) {
                this.log.warn(`Run cancelled after ${articles.length} articles`);
                stats.cancelled = true;
                break;
            }

            const resolution = await this.resolve(url, stats);
            if (!resolution.ok) {
                stats.failures.push(resolution.failure);
                continue;
            }

            const validation = validateArticle(resolution.article, this.rules);
            if (!validation.valid) {
                const reasons = validation.reasons.map((reason) => reason.message);
                this.log.warn(`Invalid article ${url}: ${reasons.join('; ')}`);
                stats.failures.push({ url, stage: 'validate', reasons });
                continue;
            }

            articles.push(resolution.article);
            this.log.info(`[${articles.length}] ${titlePreview(resolution.article.title)}`);
        }

        const finished = this.now();
        stats.validated = articles.length;
        stats.failed = stats.failures.length;
        stats.finishedAt = finished.toISOString();
        stats.durationSeconds = Math.max(0, (finished.getTime() - started.getTime()) / 1000);

        this.log.info(
            `Done: ${stats.validated} valid of ${stats.found} found, ${stats.failed} failed, ` +
            `${stats.cacheHits} from cache, ${stats.networkFetches} fetched`,
        );

        return { site, articles, stats };
    }

    private async discover(limit: number, stats: RunStats): Promise<string[]> {
        const seen = new Set<string>();
        const candidates: string[] = [];
        const listingUrls = this.extractor.listingUrls();

        for (const [index, pageUrl] of listingUrls.entries()) {
            if (limit > 0 && candidates.length >= limit) break;

            const html = await this.loadListing(pageUrl, index === 0, stats);
            if (html === null) continue;

            for (const link of this.extractor.discoverArticleLinks(html, 0, pageUrl)) {
                const key = normalizeUrl(link);
                if (seen.has(key)) continue;
                seen.add(key);
                candidates.push(link);
            }
        }

        return limit > 0 ? candidates.slice(0, limit) : candidates;
    }

    // null when an optional listing page could not be fetched.
    private async loadListing(pageUrl: string, required: boolean, stats: RunStats): Promise<string | null> {
        const cached = await this.cachedPayload(pageUrl);
        if (cached?.kind === 'html') {
            stats.cacheHits++;
            return cached.html;
        }

        stats.networkFetches++;
        const outcome = await this.fetcher.fetch(pageUrl);
        if (!outcome.ok) {
            if (required) throw new ListingUnavailableError(pageUrl, outcome.error);
            this.log.warn(`Skipping listing ${pageUrl}: ${outcome.error.message}`);
            return null;
        }

        await this.store(pageUrl, { kind: 'html', html: outcome.document.html }, this.listingTtlMs);
        return outcome.document.html;
    }

    private async resolve(url: string, stats: RunStats): Promise<Resolution> {
        const cached = await this.cachedPayload(url);
        if (cached?.kind === 'article') {
            stats.cacheHits++;
            return { ok: true, article: cached.article };
        }

        let extracted: ExtractionOutcome;
        if (cached?.kind === 'html') {
            stats.cacheHits++;
            extracted = this.extractor.extractArticle(cached.html, url, this.now());
        } else {
            stats.networkFetches++;
            const outcome = await this.fetcher.fetch(url);
            if (!outcome.ok) {
                return { ok: false, failure: { url, stage: 'fetch', reasons: [outcome.error.message] } };
            }

            extracted = this.extractor.extractArticle(outcome.document.html, url, this.now());
            if (!extracted.ok) {
                await this.store(url, { kind: 'html', html: outcome.document.html }, this.articleTtlMs);
            }
        }

        if (!extracted.ok) {
            return { ok: false, failure: { url, stage: 'extract', reasons: [extracted.error.message] } };
        }

        await this.store(url, { kind: 'article', article: extracted.article }, this.articleTtlMs);
        return { ok: true, article: extracted.article };
    }

    // Fresh payload for url, or null on miss, expiry, or a failing store.
    private async cachedPayload(url: string): Promise<CachePayload | null> {
        if (!this.useCache) return null;

        try {
            const result = await this.cache.get(url);
            if (result.status === 'hit') {
                this.log.debug(`Cache hit ${url}`);
                return result.entry.payload;
            }
            this.log.debug(`Cache ${result.status} ${url}`);
            return null;
        } catch (err) {
            this.log.warn(`Cache read failed for ${url}: ${errorMessage(err)}`);
            return null;
        }
    }

    private async store(url: string, payload: CachePayload, ttlMs: number): Promise<void> {
        if (!this.useCache) return;

        try {
            await this.cache.put(url, payload, ttlMs);
        } catch (err) {
            this.log.warn(`Cache write failed for ${url}: ${errorMessage(err)}`);
        }
    }
}
