import type { Article } from './article.js';

export type ValidationReasonCode =
    | 'invalid-url'
    | 'empty-title'
    | 'content-too-short'
    | 'missing-scraped-at';

export interface ValidationReason {
    code: ValidationReasonCode;
    message: string;
}

export type ValidationResult =
    | { valid: true }
    | { valid: false; reasons: ValidationReason[] };

export interface ValidationRules {
    // Inclusive lower bound on trimmed body length; rejects teaser-only pages.
    minContentLength: number;
}

export const DEFAULT_VALIDATION_RULES: ValidationRules = {
    minContentLength: 50,
};

export function isWellFormedUrl(value: string): boolean {
    if (!value) return false;
    try {
        const url = new URL(value);
        return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
    } catch {
        return false;
    }
}

/**
 * Checks every rule and reports all that fail, so one rejected page shows
 * everything that was wrong with it. Never throws.
 */
export function validateArticle(
    article: Article,
    rules: ValidationRules = DEFAULT_VALIDATION_RULES,
): ValidationResult {
    const reasons: ValidationReason[] = [];

    if (!isWellFormedUrl(article.url.trim())) {
        reasons.push({ code: 'invalid-url', message: `URL "${article.url}" is not a well-formed http(s) URL` });
    }

    if (article.title.trim() === '') {
        reasons.push({ code: 'empty-title', message: 'Title is empty' });
    }

    const contentLength = article.content.trim().length;
    if (contentLength < rules.minContentLength) {
        reasons.push({
            code: 'content-too-short',
            message: `Content has ${contentLength} characters, at least ${rules.minContentLength} required`,
        });
    }

    if (!article.scrapedAt || Number.isNaN(Date.parse(article.scrapedAt))) {
        reasons.push({ code: 'missing-scraped-at', message: 'scrapedAt is not set' });
    }

    return reasons.length === 0 ? { valid: true } : { valid: false, reasons };
}
