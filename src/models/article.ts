import { z } from 'zod';

export const ArticleSchema = z.object({
    title: z.string(),
    content: z.string(),
    author: z.string(),
    publishedAt: z.string().nullable(),
    url: z.string(),
    imageUrl: z.string().nullable(),
    siteName: z.string(),
    scrapedAt: z.string(),
});

export type Article = Readonly<z.infer<typeof ArticleSchema>>;

export interface ArticleInit {
    title: string;
    content: string;
    url: string;
    siteName: string;
    author?: string | null;
    publishedAt?: string | Date | null;
    imageUrl?: string | null;
    scrapedAt?: string | Date;
}

// ISO-8601 in UTC, or null when the value is missing or unparseable.
export function toIsoDate(value: string | Date | null | undefined): string | null {
    if (value === null || value === undefined) return null;

    if (typeof value === 'string' && value.trim() === '') return null;

    const date = typeof value === 'string' ? new Date(value.trim()) : value;
    if (Number.isNaN(date.getTime())) return null;
    return date.toISOString();
}

export function createArticle(init: ArticleInit): Article {
    const scrapedAt = toIsoDate(init.scrapedAt ?? new Date()) ?? new Date().toISOString();
    const imageUrl = init.imageUrl?.trim();

    return Object.freeze({
        title: init.title.trim(),
        content: init.content.trim(),
        author: init.author?.trim() ?? '',
        publishedAt: toIsoDate(init.publishedAt),
        url: init.url.trim(),
        imageUrl: imageUrl ? imageUrl : null,
        siteName: init.siteName.trim(),
        scrapedAt,
    });
}

export function titlePreview(title: string, maxLength = 80): string {
    if (title.length <= maxLength) return title;

    const cut = title.slice(0, maxLength);
    const lastSpace = cut.lastIndexOf(' ');
    return `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}...`;
}
