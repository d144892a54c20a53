import * as cheerio from 'cheerio';
import { normalizeUrl } from '../database/cache-key.js';
import { ExtractionError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';

const log = createLogger('Extractor');

export type Page = cheerio.CheerioAPI;

export function loadDocument(html: string, url: string): Page {
    if (html.trim() === '') {
        throw new ExtractionError('malformed-html', url, `Empty document for ${url}`);
    }

    const $ = cheerio.load(html);
    if ($('body').text().trim() === '' && $('meta, h1, p').length === 0) {
        throw new ExtractionError('malformed-html', url, `Document for ${url} has no readable content`);
    }
    return $;
}

export function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

// Text of the first selector that yields a non-empty match.
// Texts of maxLength characters or more are skipped, and the next selector is tried.
export function firstText($: Page, selectors: string[], maxLength = Infinity): string | null {
    for (const selector of selectors) {
        const text = cleanText($(selector).first().text());
        if (text && text.length < maxLength) return text;
    }
    return null;
}

export function metaContent($: Page, names: string[]): string | null {
    for (const name of names) {
        const content = $(`meta[property="${name}"], meta[name="${name}"], meta[itemprop="${name}"]`)
            .first()
            .attr('content')
            ?.trim();
        if (content) return content;
    }
    return null;
}

/**
 * Absolute http(s) form of `href` against `base`, without fragment.
 * Handles relative and protocol-relative links.
 */
export function resolveHref(href: string | undefined, base: string): string | null {
    const trimmed = href?.trim();
    if (!trimmed) return null;

    try {
        const url = new URL(trimmed, base);
        if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
        url.hash = '';
        return url.toString();
    } catch {
        return null;
    }
}

export interface ParagraphOptions {
    longerThan?: number;
    // Paragraphs containing any of these (case-insensitive) are dropped.
    skip?: string[];
}

/**
 * Paragraph texts from the first selector that yields any, joined by blank lines.
 */
export function collectParagraphs($: Page, selectors: string[], options: ParagraphOptions = {}): string {
    const longerThan = options.longerThan ?? 0;
    const skip = (options.skip ?? []).map((phrase) => phrase.toLowerCase());

    for (const selector of selectors) {
        const parts: string[] = [];
        $(selector).each((_, element) => {
            const text = cleanText($(element).text());
            if (text.length <= longerThan) return;
            const lower = text.toLowerCase();
            if (skip.some((phrase) => lower.includes(phrase))) return;
            parts.push(text);
        });
        if (parts.length > 0) return parts.join('\n\n');
    }
    return '';
}

type JsonLdNode = Record<string, unknown>;

function isRecord(value: unknown): value is JsonLdNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flattenJsonLd(value: unknown, nodes: JsonLdNode[]): void {
    if (Array.isArray(value)) {
        for (const item of value) flattenJsonLd(item, nodes);
        return;
    }
    if (!isRecord(value)) return;

    nodes.push(value);
    if ('@graph' in value) flattenJsonLd(value['@graph'], nodes);
}

export function readJsonLd($: Page): JsonLdNode[] {
    const nodes: JsonLdNode[] = [];
    $('script[type="application/ld+json"]').each((_, element) => {
        const raw = $(element).html() ?? '';
        try {
            const parsed: unknown = JSON.parse(raw);
            flattenJsonLd(parsed, nodes);
        } catch (err) {
            log.debug(`Skipping unparseable JSON-LD block: ${errorMessage(err)}`);
        }
    });
    return nodes;
}

// Strings, the first usable item of arrays, and the first of `keys` present on objects.
function jsonLdText(value: unknown, keys: string[]): string | null {
    if (typeof value === 'string') return value.trim() || null;
    if (Array.isArray(value)) {
        for (const item of value) {
            const text = jsonLdText(item, keys);
            if (text) return text;
        }
        return null;
    }
    if (isRecord(value)) {
        for (const key of keys) {
            const text = jsonLdText(value[key], keys);
            if (text) return text;
        }
    }
    return null;
}

/**
 * First non-empty value of `fields` across all JSON-LD nodes. Object values
 * (an `ImageObject`, a `Person`) are read through `keys`.
 */
export function jsonLdField($: Page, fields: string[], keys: string[] = ['url', 'name']): string | null {
    const nodes = readJsonLd($);
    for (const field of fields) {
        for (const node of nodes) {
            const text = jsonLdText(node[field], keys);
            if (text) return text;
        }
    }
    return null;
}

const NON_CONTENT_IMAGE = [
    'logo',
    'icon-',
    'avatar',
    'profile-',
    'share-',
    'social-',
    'banner-',
    '/ads/',
    'advertisement',
    'promo-',
    'widget-',
    'placeholder',
    'default-',
    'blank',
    '1x1',
    'pixel',
    'facebook',
    'twitter',
    'youtube',
    'instagram',
];

export function isLikelyHeroImage(src: string): boolean {
    if (src.startsWith('data:')) return false;
    const lower = src.toLowerCase();
    return !NON_CONTENT_IMAGE.some((pattern) => lower.includes(pattern));
}

const IMAGE_SOURCE_ATTRS = ['src', 'data-src', 'data-lazy-src', 'data-original'];

function dimension(value: string | undefined): number | null {
    if (value === undefined) return null;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
}

export function firstContentImage($: Page, pageUrl: string, selector = 'article img, img'): string | null {
    let found: string | null = null;
    $(selector).each((_, element) => {
        const img = $(element);
        const width = dimension(img.attr('width'));
        const height = dimension(img.attr('height'));
        if (width !== null && height !== null && width < 100 && height < 100) return;

        for (const attr of IMAGE_SOURCE_ATTRS) {
            const src = resolveHref(img.attr(attr), pageUrl);
            if (src && isLikelyHeroImage(src)) {
                found = src;
                return false;
            }
        }
        return;
    });
    return found;
}

// og:image, twitter:image, image meta, JSON-LD, then the first plausible content image.
export function extractHeroImage($: Page, pageUrl: string, contentSelector?: string): string | null {
    const meta = resolveHref(metaContent($, ['og:image', 'twitter:image', 'image']) ?? undefined, pageUrl);
    if (meta) return meta;

    const linked = resolveHref(jsonLdField($, ['image', 'thumbnailUrl']) ?? undefined, pageUrl);
    if (linked) return linked;

    return firstContentImage($, pageUrl, contentSelector);
}

const NON_ARTICLE_SEGMENTS = new Set([
    'tag',
    'tags',
    'author',
    'category',
    'search',
    'page',
    'archive',
    'api',
    'collection',
    'latest',
]);

export function hasNonArticleSegment(url: URL): boolean {
    return url.pathname
        .split('/')
        .filter(Boolean)
        .some((segment) => NON_ARTICLE_SEGMENTS.has(segment.toLowerCase()));
}

/**
 * Normalised article URLs linked from a listing page, in document order.
 * `limit` 0 collects every match.
 */
export function collectLinks(
    $: Page,
    pageUrl: string,
    isArticle: (url: URL) => boolean,
    limit: number,
): string[] {
    const seen = new Set<string>();
    const links: string[] = [];

    $('a[href]').each((_, element) => {
        if (limit > 0 && links.length >= limit) return false;

        const href = resolveHref($(element).attr('href'), pageUrl);
        if (!href) return;

        const url = new URL(href);
        if (hasNonArticleSegment(url) || !isArticle(url)) return;

        const normalized = normalizeUrl(href);
        if (seen.has(normalized)) return;
        seen.add(normalized);
        links.push(normalized);
        return;
    });

    return links;
}
