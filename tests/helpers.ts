import { FetchError } from '../src/errors';
import type { Clock } from '../src/http/throttle';
import type { FetchOutcome, PageFetcher } from '../src/types';

// Virtual time: sleep() advances now() instead of waiting.
export class FakeClock implements Clock {
    sleeps: number[] = [];

    constructor(public time = 0) {}

    now(): number {
        return this.time;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.time += ms;
    }

    advance(ms: number): void {
        this.time += ms;
    }
}

/**
 * Serves canned HTML by exact URL. Unknown URLs fail with a 404 FetchError,
 * URLs in `failing` with a network error.
 */
export class FakeFetcher implements PageFetcher {
    readonly calls: string[] = [];
    readonly pages = new Map<string, string>();
    readonly failing = new Set<string>();

    constructor(pages: Record<string, string> = {}) {
        for (const [url, html] of Object.entries(pages)) {
            this.pages.set(url, html);
        }
    }

    async fetch(url: string): Promise<FetchOutcome> {
        this.calls.push(url);

        if (this.failing.has(url)) {
            return {
                ok: false,
                error: new FetchError({ kind: 'network', url, message: `connect ECONNREFUSED for ${url}`, attempts: 3 }),
            };
        }

        const html = this.pages.get(url);
        if (html === undefined) {
            return {
                ok: false,
                error: new FetchError({ kind: 'http-status', url, status: 404, message: `HTTP 404 for ${url}`, attempts: 1 }),
            };
        }

        return {
            ok: true,
            document: { url, status: 200, charset: 'utf-8', html, fetchedAt: '2025-09-13T12:00:00.000Z' },
        };
    }

    callsTo(url: string): number {
        return this.calls.filter((call) => call === url).length;
    }
}

export const LONG_PARAGRAPH =
    'ঢাকায় আজ সকাল থেকে ভারী বৃষ্টি হচ্ছে এবং নগরের বিভিন্ন সড়কে জলাবদ্ধতা দেখা দিয়েছে।';

export interface StoryInit {
    title: string;
    paragraphs?: string[];
    publishedAt?: string;
}

// Minimal Prothom Alo story page.
export function prothomAloStory(init: StoryInit): string {
    const paragraphs = (init.paragraphs ?? [LONG_PARAGRAPH])
        .map((text) => `<div class="story-element-text"><p>${text}</p></div>`)
        .join('\n');
    const time = init.publishedAt ? `<time datetime="${init.publishedAt}">published</time>` : '';

    return `<!doctype html>
<html lang="bn">
<head><title>${init.title}</title></head>
<body>
<h1 data-title-0="true">${init.title}</h1>
${time}
${paragraphs}
</body>
</html>`;
}

export function listingPage(hrefs: string[]): string {
    const anchors = hrefs.map((href, i) => `<li><a href="${href}">Story ${i + 1}</a></li>`).join('\n');
    return `<!doctype html><html><body><h1>Latest</h1><ul>${anchors}</ul></body></html>`;
}
