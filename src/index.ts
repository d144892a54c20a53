import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { openCacheStore } from './database/index.js';
import { HttpFetcher } from './http/fetcher.js';
import { createLogger, errorMessage, setLogLevel } from './logger.js';
import { createServer } from './server.js';

const log = createLogger('Server');

async function main(): Promise<void> {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const cache = await openCacheStore(config.cache);
    const fetcher = new HttpFetcher({
        delayMs: config.fetch.delayMs,
        timeoutMs: config.fetch.timeoutMs,
        retry: { maxAttempts: config.fetch.maxAttempts },
    });

    const server = createServer({ config, cache, fetcher });

    const httpServer = serve({ fetch: server.fetch, port: config.port }, (info) => {
        log.info(`khobor-scraper listening on http://localhost:${info.port} (cache: ${config.cache.backend})`);
    });

    const shutdown = (signal: string): void => {
        log.info(`${signal} received, shutting down`);
        httpServer.close();
        cache
            .close()
            .then(() => process.exit(0))
            .catch((err: unknown) => {
                log.error(`Failed to close cache: ${errorMessage(err)}`);
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    log.error(`Startup failed: ${errorMessage(err)}`);
    process.exit(1);
});
