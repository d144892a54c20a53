import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../src/config';
import { MemoryCacheStore } from '../src/database/memory-cache';
import { createServer } from '../src/server';
import { FakeFetcher, listingPage, prothomAloStory } from './helpers';

const PA_HOME = 'https://www.prothomalo.com';
const PA_1 = 'https://www.prothomalo.com/bangladesh/capital/aaa111bbbb';
const PA_2 = 'https://www.prothomalo.com/world/asia/ccc222dddd';
const ITTEFAQ_HOME = 'https://www.ittefaq.com.bd';
const ITTEFAQ_1 = 'https://www.ittefaq.com.bd/751813/padma-bridge-traffic';

const fixture = (name: string) => readFileSync(join(__dirname, 'fixtures', name), 'utf-8');

let testDir: string;

beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'server-test-'));
});

afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
});

function setup() {
    const fetcher = new FakeFetcher({
        [PA_HOME]: listingPage([PA_1, PA_2]),
        [PA_1]: prothomAloStory({ title: 'প্রথম খবর' }),
        [PA_2]: prothomAloStory({ title: 'দ্বিতীয় খবর' }),
        [ITTEFAQ_HOME]: fixture('ittefaq-home.html'),
        [ITTEFAQ_1]: fixture('ittefaq-article.html'),
    });
    const cache = new MemoryCacheStore();
    const config = loadConfig({ CACHE_BACKEND: 'memory', OUTPUT_DIR: testDir });
    const server = createServer({ config, cache, fetcher });
    return { server, fetcher, cache };
}

describe('HTTP API', () => {
    it('GET /health reports ok', async () => {
        const { server } = setup();
        const res = await server.request('/health');

        expect(res.status).toBe(200);
        expect(JSON.parse(await res.text()).status).toBe('ok');
    });

    it('GET /sites lists the site table', async () => {
        const { server } = setup();
        const body = JSON.parse(await (await server.request('/sites')).text());

        expect(body.sites.map((site: { id: string }) => site.id)).toEqual(['prothom-alo', 'ittefaq']);
    });

    it('GET /scrape returns the envelope and run stats per site', async () => {
        const { server } = setup();
        const res = await server.request('/scrape?site=prothom-alo&limit=2');
        const body = JSON.parse(await res.text());

        expect(res.status).toBe(200);
        expect(body.success).toBe(true);
        expect(body.results).toHaveLength(1);
        expect(body.results[0].site).toBe('prothom-alo');
        expect(body.results[0].totalValid).toBe(2);
        expect(body.results[0].successRate).toBe(100);
        expect(body.results[0].articles.map((article: { url: string }) => article.url)).toEqual([PA_1, PA_2]);
        expect(body.results[0].stats.networkFetches).toBe(3);
        expect(body.results[0].savedTo).toBeNull();
    });

    it('answers 400 for an unknown site', async () => {
        const { server, fetcher } = setup();
        const res = await server.request('/scrape?site=bbc');

        expect(res.status).toBe(400);
        expect(JSON.parse(await res.text())).toEqual({
            success: false,
            error: 'Unknown site "bbc". Supported sites: prothom-alo, ittefaq',
        });
        expect(fetcher.calls).toEqual([]);
    });

    it('answers 400 for a bad limit or format', async () => {
        const { server } = setup();

        expect((await server.request('/scrape?limit=many')).status).toBe(400);
        expect((await server.request('/scrape?format=xml')).status).toBe(400);
    });

    it('answers 502 when no site could be reached', async () => {
        const { server, fetcher } = setup();
        fetcher.failing.add(ITTEFAQ_HOME);

        const res = await server.request('/scrape?site=ittefaq&limit=1');
        const body = JSON.parse(await res.text());

        expect(res.status).toBe(502);
        expect(body.success).toBe(false);
        expect(body.results[0].success).toBe(false);
        expect(body.results[0].error).toContain(`Listing page ${ITTEFAQ_HOME} could not be fetched`);
    });

    it('returns one CSV for several sites', async () => {
        const { server } = setup();
        const res = await server.request('/scrape?site=all&limit=1&format=csv');
        const lines = (await res.text()).trimEnd().split('\n');

        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('text/csv; charset=utf-8');
        expect(lines).toHaveLength(3);
        expect(lines[0]).toBe('title,content,author,date,url,imageUrl,siteName,scrapedAt');
        expect(lines[1].startsWith('প্রথম খবর,')).toBe(true);
        expect(lines[2].startsWith('পদ্মা সেতুতে যান চলাচল স্বাভাবিক,')).toBe(true);
    });

    it('returns a bare article array with envelope=false', async () => {
        const { server } = setup();
        const res = await server.request('/scrape?site=all&limit=1&envelope=false');
        const body = JSON.parse(await res.text());

        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
        expect(body.map((article: { url: string }) => article.url)).toEqual([PA_1, ITTEFAQ_1]);
    });

    it('saves results when asked', async () => {
        const { server } = setup();
        const body = JSON.parse(await (await server.request('/scrape?site=prothom-alo&limit=1&save=true')).text());

        const savedTo: string = body.results[0].savedTo;
        expect(savedTo.startsWith(join(testDir, 'json'))).toBe(true);
        expect(JSON.parse(await readFile(savedTo, 'utf-8')).totalValid).toBe(1);
    });

    it('exposes cache statistics, sweeping and clearing', async () => {
        const { server } = setup();
        await server.request('/scrape?site=prothom-alo&limit=2');

        const stats = JSON.parse(await (await server.request('/cache/stats')).text());
        expect(stats.backend).toBe('memory');
        expect(stats.entryCount).toBe(3);

        const swept = JSON.parse(await (await server.request('/cache/sweep', { method: 'POST' })).text());
        expect(swept).toEqual({ success: true, removed: 0 });

        const cleared = JSON.parse(await (await server.request('/cache', { method: 'DELETE' })).text());
        expect(cleared).toEqual({ success: true, removed: 3 });
    });
});
