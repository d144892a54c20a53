import type { SiteConfig } from '../config.js';
import { ExtractionError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { createArticle } from '../models/article.js';
import type { ExtractionOutcome, SiteDescriptor, SiteExtractor } from '../types.js';
import { parseBengaliDate } from './bengali-date.js';
import {
    cleanText,
    collectLinks,
    collectParagraphs,
    extractHeroImage,
    firstText,
    loadDocument,
    metaContent,
    type Page,
} from './common.js';

const TITLE_SUFFIX = /\s*[-|]\s*The Daily Ittefaq\s*$/i;

const BODY_SELECTORS = ['[itemprop="articleBody"] p', '.jw_article_body p', 'article p', 'p'];

// Share widgets and the publisher footer are rendered as paragraphs too.
const BOILERPLATE = [
    'share',
    'facebook',
    'twitter',
    'ফেসবুক',
    'টুইটার',
    'copyright',
    'সর্বস্বত্ব সংরক্ষিত',
    'প্রকাশক',
    'সম্পাদক',
    'মুদ্রিত',
    'কাওরান বাজার',
    'ঢাকা-১২১৫',
];

const AUTHOR_SELECTORS = ['.author', '.byline', '[class*="author"]'];

// Longer matches are widgets such as related-story lists, not bylines.
const MAX_AUTHOR_LENGTH = 100;

const DESK = 'ইত্তেফাক ডিজিটাল ডেস্ক';

const DESK_BYLINE = /(ইত্তেফাক ডিজিটাল ডেস্ক|ইত্তেফাক[^।\n]*?)\s*প্রকাশ\s*:/u;

const PUBLISHED_LINE = /প্রকাশ\s*:\s*([^\n|]+)/u;

export class IttefaqExtractor implements SiteExtractor {
    readonly site: SiteDescriptor;
    private readonly host: string;
    private readonly log: Logger;

    constructor(config: SiteConfig) {
        this.site = { id: config.id, name: config.name, baseUrl: config.baseUrl };
        this.host = new URL(config.baseUrl).hostname;
        this.log = createLogger(config.name);
    }

    // Home page only; the front page lists the latest stories of every section.
    listingUrls(): string[] {
        return [this.site.baseUrl];
    }

    isArticleUrl(url: URL): boolean {
        if (url.hostname !== this.host) return false;
        const [first] = url.pathname.split('/').filter(Boolean);
        return first !== undefined && /^\d+$/.test(first);
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

            const heading = firstText($, ['h1']) ?? metaContent($, ['og:title']);
            const title = heading?.replace(TITLE_SUFFIX, '').trim();
            if (!title) {
                throw new ExtractionError('missing-field', url, `No title found on ${url}`, 'title');
            }

            const article = createArticle({
                title,
                content: collectParagraphs($, BODY_SELECTORS, { longerThan: 20, skip: BOILERPLATE }),
                author: this.author($),
                publishedAt: this.publishedAt($),
                url,
                imageUrl: extractHeroImage($, url, 'article img, .jw_article_body img, img'),
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
        const byElement = firstText($, AUTHOR_SELECTORS, MAX_AUTHOR_LENGTH);
        if (byElement) return byElement;

        const match = DESK_BYLINE.exec($('body').text());
        return match ? cleanText(match[1]) : DESK;
    }

    private publishedAt($: Page): string | null {
        const meta = metaContent($, ['article:published_time', 'publish-date']);
        if (meta) return meta;

        const line = PUBLISHED_LINE.exec($('body').text());
        return line ? parseBengaliDate(line[1]) : null;
    }
}
