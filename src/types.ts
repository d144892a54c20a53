import type { SiteId } from './config.js';
import type { ExtractionError, FetchError } from './errors.js';
import type { Article } from './models/article.js';

export type { Article } from './models/article.js';
export type { SiteId } from './config.js';

export interface SiteDescriptor {
    id: SiteId;
    name: string;
    baseUrl: string;
}

// A fetched page, already decoded with its declared charset.
export interface RawDocument {
    url: string;
    status: number;
    charset: string;
    html: string;
    fetchedAt: string;
}

export type FetchOutcome =
    | { ok: true; document: RawDocument }
    | { ok: false; error: FetchError };

export interface PageFetcher {
    fetch(url: string): Promise<FetchOutcome>;
}

export type ExtractionOutcome =
    | { ok: true; article: Article }
    | { ok: false; error: ExtractionError };

//Contract every site extractor must implement
export interface SiteExtractor {
    readonly site: SiteDescriptor;

    // Listing pages to visit, home page first.
    listingUrls(): string[];

    /**
     * Candidate article URLs in page order, absolute and de-duplicated.
     * `limit` 0 returns every link found on the page.
     */
    discoverArticleLinks(listingHtml: string, limit: number, pageUrl?: string): string[];

    extractArticle(articleHtml: string, url: string, scrapedAt?: Date): ExtractionOutcome;
}

export type FailureStage = 'fetch' | 'extract' | 'validate';

export interface FailureRecord {
    url: string;
    stage: FailureStage;
    reasons: string[];
}

export interface RunStats {
    siteId: SiteId;
    siteName: string;
    requested: number;
    found: number;
    validated: number;
    failed: number;
    cacheHits: number;
    networkFetches: number;
    startedAt: string;
    finishedAt: string;
    durationSeconds: number;
    cancelled: boolean;
    failures: FailureRecord[];
}

// Result returned by the orchestrator after one run
export interface ScrapeResult {
    site: SiteDescriptor;
    articles: Article[];
    stats: RunStats;
}
