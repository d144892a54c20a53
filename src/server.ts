import { Hono } from 'hono';
import app, { type AppDeps, type SiteOutcome } from './app.js';
import { SITES, SITE_IDS } from './config.js';
import { ConfigurationError, ListingUnavailableError } from './errors.js';
import { createLogger } from './logger.js';
import { CSV_HEADER, isOutputFormat, toCsvRows, toEnvelope, toJsonArray } from './storage.js';

const log = createLogger('Server');

const DEFAULT_SITE = 'prothom-alo';
const DEFAULT_LIMIT = '5';

function parseFlag(value: string | undefined): boolean {
    return value === 'true' || value === '1';
}

function describeOutcome(outcome: SiteOutcome) {
    if (!outcome.ok) {
        return { site: outcome.site.id, success: false, error: outcome.error.message };
    }
    return {
        site: outcome.site.id,
        success: true,
        ...toEnvelope(outcome.result),
        stats: outcome.result.stats,
        savedTo: outcome.savedTo ?? null,
    };
}

export function createServer(deps: AppDeps): Hono {
    const server = new Hono();

    server.get('/health', (c) => {
        return c.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    server.get('/sites', (c) => {
        return c.json({ sites: SITE_IDS.map((id) => SITES[id]) });
    });

    server.get('/scrape', async (c) => {
        const format = c.req.query('format') ?? 'json';
        if (!isOutputFormat(format)) {
            throw new ConfigurationError(`Invalid format "${format}": expected json or csv`);
        }

        const sites = (c.req.query('site') ?? DEFAULT_SITE).split(',').map((site) => site.trim());
        const save = parseFlag(c.req.query('save'));
        const envelopeParam = c.req.query('envelope');
        const envelope = envelopeParam === undefined || parseFlag(envelopeParam);
        log.info(`Scrape requested: site=${sites.join(',')} format=${format} save=${save}`);

        const startTime = Date.now();
        const outcomes = await app(deps, {
            sites,
            limit: c.req.query('limit') ?? DEFAULT_LIMIT,
            save: save ? format : undefined,
            envelope,
            signal: c.req.raw.signal,
        });
        const duration = ((Date.now() - startTime) / 1000).toFixed(1);
        const anySucceeded = outcomes.some((outcome) => outcome.ok);

        if (format === 'csv' && anySucceeded) {
            const rows = outcomes.flatMap((outcome) => (outcome.ok ? toCsvRows(outcome.result.articles) : []));
            const csv = [CSV_HEADER.join(','), ...rows].join('\n') + '\n';
            return c.body(csv, 200, { 'Content-Type': 'text/csv; charset=utf-8' });
        }

        if (!envelope && anySucceeded) {
            const articles = outcomes.flatMap((outcome) => (outcome.ok ? outcome.result.articles : []));
            return c.body(toJsonArray(articles), 200, { 'Content-Type': 'application/json; charset=utf-8' });
        }

        return c.json(
            {
                success: anySucceeded,
                duration: `${duration}s`,
                results: outcomes.map(describeOutcome),
            },
            anySucceeded ? 200 : 502,
        );
    });

    server.get('/cache/stats', async (c) => {
        return c.json({ success: true, backend: deps.config.cache.backend, ...(await deps.cache.stats()) });
    });

    server.post('/cache/sweep', async (c) => {
        const removed = await deps.cache.sweep();
        return c.json({ success: true, removed });
    });

    server.delete('/cache', async (c) => {
        const removed = await deps.cache.clear();
        return c.json({ success: true, removed });
    });

    server.onError((err, c) => {
        if (err instanceof ConfigurationError) {
            log.warn(err.message);
            return c.json({ success: false, error: err.message }, 400);
        }
        if (err instanceof ListingUnavailableError) {
            log.error(err.message);
            return c.json({ success: false, error: err.message }, 502);
        }
        log.error('Request failed:', err);
        return c.json({ success: false, error: err.message || 'Unknown error' }, 500);
    });

    return server;
}
