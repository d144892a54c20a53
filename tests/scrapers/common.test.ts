import * as cheerio from 'cheerio';
import {
    cleanText,
    collectLinks,
    collectParagraphs,
    extractHeroImage,
    firstContentImage,
    firstText,
    isLikelyHeroImage,
    jsonLdField,
    loadDocument,
    readJsonLd,
    resolveHref,
} from '../../src/scrapers/common';
import { ExtractionError } from '../../src/errors';

const PAGE = 'https://www.example.com/news/story';

describe('loadDocument', () => {
    it('rejects empty documents as malformed', () => {
        expect(() => loadDocument('   ', PAGE)).toThrow(ExtractionError);
        expect(() => loadDocument('', PAGE)).toThrow(`Empty document for ${PAGE}`);
    });

    it('parses anything with readable content', () => {
        const $ = loadDocument('<p>hello</p>', PAGE);
        expect($('p').text()).toBe('hello');
    });
});

describe('cleanText', () => {
    it('collapses whitespace including newlines', () => {
        expect(cleanText('  এক \n\t দুই  ')).toBe('এক দুই');
    });
});

describe('firstText', () => {
    const $ = cheerio.load('<div class="a"></div><div class="b">একটি খুব লম্বা লেখা</div><div class="c">ছোট</div>');

    it('returns the first selector with text', () => {
        expect(firstText($, ['.a', '.b', '.c'])).toBe('একটি খুব লম্বা লেখা');
        expect(firstText($, ['.a'])).toBeNull();
    });

    it('skips texts at or above the length bound', () => {
        expect(firstText($, ['.b', '.c'], 5)).toBe('ছোট');
    });
});

describe('resolveHref', () => {
    it('resolves relative and protocol-relative links and drops the fragment', () => {
        expect(resolveHref('/a/b#c', PAGE)).toBe('https://www.example.com/a/b');
        expect(resolveHref('//cdn.example.com/img.jpg', PAGE)).toBe('https://cdn.example.com/img.jpg');
        expect(resolveHref('other', PAGE)).toBe('https://www.example.com/news/other');
    });

    it('rejects empty and non-http links', () => {
        expect(resolveHref(undefined, PAGE)).toBeNull();
        expect(resolveHref('  ', PAGE)).toBeNull();
        expect(resolveHref('mailto:desk@example.com', PAGE)).toBeNull();
        expect(resolveHref('javascript:void(0)', PAGE)).toBeNull();
    });
});

describe('collectParagraphs', () => {
    const $ = cheerio.load(`
        <div class="body"><p>first paragraph here</p><p>  </p><p>Share this story</p><p>second paragraph here</p></div>
        <p>outside</p>`);

    it('uses the first selector with matches and joins with blank lines', () => {
        expect(collectParagraphs($, ['.missing p', '.body p'])).toBe(
            'first paragraph here\n\nShare this story\n\nsecond paragraph here',
        );
    });

    it('drops short and boilerplate paragraphs', () => {
        expect(collectParagraphs($, ['.body p'], { longerThan: 16, skip: ['share'] })).toBe(
            'first paragraph here\n\nsecond paragraph here',
        );
    });

    it('returns an empty string when nothing matches', () => {
        expect(collectParagraphs($, ['article p'])).toBe('');
    });
});

describe('JSON-LD', () => {
    const $ = cheerio.load(`
        <script type="application/ld+json">{ not valid json</script>
        <script type="application/ld+json">
        {"@context":"https://schema.org","@graph":[
            {"@type":"WebPage","name":"page"},
            {"@type":"NewsArticle","author":{"@type":"Person","name":"Desk","url":"https://www.example.com/desk"},
             "image":{"@type":"ImageObject","url":"https://img.example.com/hero.jpg"},"datePublished":"2025-09-13T08:00:00+06:00"}
        ]}
        </script>`);

    it('skips broken blocks and flattens @graph', () => {
        expect(readJsonLd($)).toHaveLength(3);
    });

    it('reads object values through the preferred keys', () => {
        expect(jsonLdField($, ['image'])).toBe('https://img.example.com/hero.jpg');
        expect(jsonLdField($, ['author'], ['name'])).toBe('Desk');
        expect(jsonLdField($, ['datePublished'])).toBe('2025-09-13T08:00:00+06:00');
        expect(jsonLdField($, ['wordCount'])).toBeNull();
    });
});

describe('images', () => {
    it('filters logos, icons, trackers and inline data', () => {
        expect(isLikelyHeroImage('https://img.example.com/2025/flood.jpg')).toBe(true);
        expect(isLikelyHeroImage('https://img.example.com/road-closure.jpg')).toBe(true);
        expect(isLikelyHeroImage('https://www.example.com/static/logo.png')).toBe(false);
        expect(isLikelyHeroImage('https://www.example.com/pixel.gif')).toBe(false);
        expect(isLikelyHeroImage('data:image/png;base64,AAAA')).toBe(false);
    });

    it('picks the first plausible content image, reading lazy-load attributes', () => {
        const $ = cheerio.load(`
            <img src="/logo.svg">
            <img src="/thumb.jpg" width="50" height="50">
            <img data-src="/uploads/hero.jpg">`);
        expect(firstContentImage($, PAGE)).toBe('https://www.example.com/uploads/hero.jpg');
    });

    it('prefers og:image over JSON-LD and content images', () => {
        const $ = cheerio.load(`
            <meta property="og:image" content="/og.jpg">
            <script type="application/ld+json">{"image":"https://img.example.com/ld.jpg"}</script>
            <img src="/uploads/body.jpg">`);
        expect(extractHeroImage($, PAGE)).toBe('https://www.example.com/og.jpg');
    });

    it('falls back to JSON-LD, then to the body', () => {
        const withLd = cheerio.load(`
            <script type="application/ld+json">{"thumbnailUrl":"https://img.example.com/ld.jpg"}</script>
            <img src="/uploads/body.jpg">`);
        expect(extractHeroImage(withLd, PAGE)).toBe('https://img.example.com/ld.jpg');

        const bodyOnly = cheerio.load('<img src="/uploads/body.jpg">');
        expect(extractHeroImage(bodyOnly, PAGE)).toBe('https://www.example.com/uploads/body.jpg');

        expect(extractHeroImage(cheerio.load('<p>no images</p>'), PAGE)).toBeNull();
    });
});

describe('collectLinks', () => {
    const $ = cheerio.load(`
        <a href="/news/1">one</a>
        <a href="/news/2?utm_source=x">two</a>
        <a href="/news/1#again">one again</a>
        <a href="/tag/3">tag</a>
        <a href="/news/4">four</a>`);
    const isNews = (url: URL) => url.pathname.startsWith('/news/') || url.pathname.startsWith('/tag/');

    it('returns normalised, de-duplicated article links in page order', () => {
        expect(collectLinks($, PAGE, isNews, 0)).toEqual([
            'https://www.example.com/news/1',
            'https://www.example.com/news/2',
            'https://www.example.com/news/4',
        ]);
    });

    it('stops at the limit', () => {
        expect(collectLinks($, PAGE, isNews, 2)).toEqual([
            'https://www.example.com/news/1',
            'https://www.example.com/news/2',
        ]);
    });
});
