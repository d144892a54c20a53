import type { SiteConfig } from '../config.js';
import { ExtractionError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { createArticle } from '../models/article.js';
import type { ExtractionOutcome, SiteDescriptor, SiteExtractor } from '../types.js';
import {
    cleanText,
    collectLinks,
    collectParagraphs,
    extractHeroImage,
    firstText,
    jsonLdField,
    loadDocument,
    metaContent,
    type Page,
} from './common.js';

const TITLE_SELECTORS = ['h1[data-title-0]', 'h1.headline', 'h1[itemprop="headline"]', 'h1'];

const BODY_SELECTORS = [
    '.story-element-text:not(.story-element-text-also-read) p',
    '[itemprop="articleBody"] p',
    '.story-content p',
];

const AUTHOR_SELECTORS = ['[itemprop="author"]', '.author-name', '.byline', '.contributor-name'];

const BYLINE_PATTERN = /(?:নিজস্ব\s+)?(?:প্রতিবেদক|সংবাদদাতা|স্টাফ রিপোর্টার)/u;

// Story ids are 10 lower-case alphanumerics with at least one digit: /bangladesh/district/8rq5vw3l2k
function isStoryId(segment: string): boolean {
    return /^[a-z0-9]{10}$/.test(segment) && /[0-9]/.test(segment);
}

export class ProthomAloExtractor implements SiteExtractor {
    readonly site: SiteDescriptor;
    private readonly sections: string[];
    private readonly host: string;
    private readonly log: Logger;

    constructor(config: SiteConfig) {
        this.site = { id: config.id, name: config.name, baseUrl: config.baseUrl };
        this.sections = config.sections;
        this.host = new URL(config.baseUrl).hostname;
        this.log = createLogger(config.name);
    }

    listingUrls(): string[] {
        return [this.site.baseUrl, ...this.sections.map((section) => `${this.site.baseUrl}/${section}`)];
    }

    isArticleUrl(url: URL): boolean {
        if (url.hostname !== this.host) return false;

        const segments = url.pathname.split('/').filter(Boolean);
        if (segments.length < 2) return false;
        return isStoryId(segments[segments.length - 1]);
    }

    discoverArticleLinks(listingHtml: string, limit: number, pageUrl = this.site.baseUrl): string[] {
        let $: Page;
        try {
            $ = loadDocument(listingHtml, pageUrl);
        } catch (err) {
            if (err instanceof ExtractionError) {
                this.log.warn(`Listing ${pageUrl} is empty, no links found`);
                return [];
            }
            throw err;
        }

        const links = collectLinks($, pageUrl, (url) => this.isArticleUrl(url), limit);
        this.log.debug(`${pageUrl}: ${links.length} article links`);
        return links;
    }

    extractArticle(articleHtml: string, url: string, scrapedAt = new Date()): ExtractionOutcome {
        try {
            const $ = loadDocument(articleHtml, url);

            const title = firstText($, TITLE_SELECTORS) ?? metaContent($, ['og:title']);
            if (!title) {
                throw new ExtractionError('missing-field', url, `No title found on ${url}`, 'title');
            }

            const article = createArticle({
                title,
                content: collectParagraphs($, BODY_SELECTORS),
                author: this.author($),
                publishedAt: this.publishedAt($),
                url,
                imageUrl: extractHeroImage($, url, '.story-element-image img, figure img, article img'),
                siteName: this.site.name,
                scrapedAt,
            });
            return { ok: true, article };
        } catch (err) {
            if (err instanceof ExtractionError) {
                this.log.warn(`Extraction failed for ${url}: ${err.message}`);
                return { ok: false, error: err };
            }
            throw err;
        }
    }

    private author($: Page): string {
        const byElement = firstText($, AUTHOR_SELECTORS) ?? jsonLdField($, ['author'], ['name']);
        if (byElement) return byElement;

        const match = BYLINE_PATTERN.exec($('body').text());
        return match ? cleanText(match[0]) : '';
    }

    private publishedAt($: Page): string | null {
        return (
            $('time[datetime]').first().attr('datetime')?.trim() ||
            metaContent($, ['article:published_time', 'datePublished']) ||
            $('[itemprop="datePublished"]').first().attr('content')?.trim() ||
            jsonLdField($, ['datePublished']) ||
            null
        );
    }
}
