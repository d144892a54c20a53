import { createArticle, titlePreview, toIsoDate } from '../../src/models/article';

describe('toIsoDate', () => {
    it('normalises offsets to UTC', () => {
        expect(toIsoDate('2025-09-13T23:11:00+06:00')).toBe('2025-09-13T17:11:00.000Z');
    });

    it('returns null for missing or unparseable values', () => {
        expect(toIsoDate(undefined)).toBeNull();
        expect(toIsoDate(null)).toBeNull();
        expect(toIsoDate('   ')).toBeNull();
        expect(toIsoDate('গতকাল')).toBeNull();
    });

    it('accepts Date instances', () => {
        expect(toIsoDate(new Date(Date.UTC(2025, 0, 2, 3, 4, 5)))).toBe('2025-01-02T03:04:05.000Z');
    });
});

describe('createArticle', () => {
    const base = {
        title: '  নির্বাচন কমিশনের বৈঠক  ',
        content: '\nবৈঠকে সিদ্ধান্ত হয়েছে।\n',
        url: 'https://www.prothomalo.com/politics/abc123defg',
        siteName: 'Prothom Alo',
        scrapedAt: '2025-09-13T12:00:00.000Z',
    };

    it('trims text fields and fills defaults', () => {
        expect(createArticle(base)).toEqual({
            title: 'নির্বাচন কমিশনের বৈঠক',
            content: 'বৈঠকে সিদ্ধান্ত হয়েছে।',
            author: '',
            publishedAt: null,
            url: 'https://www.prothomalo.com/politics/abc123defg',
            imageUrl: null,
            siteName: 'Prothom Alo',
            scrapedAt: '2025-09-13T12:00:00.000Z',
        });
    });

    it('turns an empty image URL into null and keeps a real one', () => {
        expect(createArticle({ ...base, imageUrl: ' ' }).imageUrl).toBeNull();
        expect(createArticle({ ...base, imageUrl: 'https://images.prothomalo.com/a.jpg' }).imageUrl).toBe(
            'https://images.prothomalo.com/a.jpg',
        );
    });

    it('returns a frozen object', () => {
        expect(Object.isFrozen(createArticle(base))).toBe(true);
    });

    it('stamps scrapedAt when none is given', () => {
        const before = Date.now();
        const article = createArticle({ ...base, scrapedAt: undefined });
        expect(Date.parse(article.scrapedAt)).toBeGreaterThanOrEqual(before - 1000);
    });
});

describe('titlePreview', () => {
    it('leaves short titles alone', () => {
        expect(titlePreview('ছোট শিরোনাম')).toBe('ছোট শিরোনাম');
    });

    it('cuts long titles at a word boundary', () => {
        expect(titlePreview('one two three four', 10)).toBe('one two...');
    });
});
