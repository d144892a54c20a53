import { parseLimit, resolveSites, type AppConfig } from './config.js';
import type { CacheStore } from './database/cache-store.js';
import { ListingUnavailableError } from './errors.js';
import { createLogger } from './logger.js';
import { ScrapeOrchestrator } from './orchestrator.js';
import { createExtractor } from './scrapers/index.js';
import { saveResult, type OutputFormat } from './storage.js';
import type { PageFetcher, ScrapeResult, SiteDescriptor, SiteExtractor } from './types.js';

const log = createLogger('App');

export interface AppDeps {
	config: AppConfig;
	cache: CacheStore;
	fetcher: PageFetcher;
	createExtractor?: (siteId: string) => SiteExtractor;
}

export interface ScrapeRequest {
	// Site ids, or "all".
	sites: string[];
	limit: unknown;
	save?: OutputFormat;
	// Saved JSON is an envelope unless this is false.
	envelope?: boolean;
	signal?: AbortSignal;
}

export type SiteOutcome =
	| { site: SiteDescriptor; ok: true; result: ScrapeResult; savedTo?: string }
	| { site: SiteDescriptor; ok: false; error: ListingUnavailableError };

/**
 * Scrapes the requested sites one after another. Unknown sites and bad limits
 * throw ConfigurationError before any request; a site whose first listing page
 * is unreachable is reported as failed and the next site still runs.
 */
export default async function app(deps: AppDeps, request: ScrapeRequest): Promise<SiteOutcome[]> {
	const sites = resolveSites(request.sites);
	const limit = parseLimit(request.limit);
	const build = deps.createExtractor ?? createExtractor;
	const outcomes: SiteOutcome[] = [];

	for (const site of sites) {
		const extractor = build(site.id);
		const orchestrator = new ScrapeOrchestrator({
			extractor,
			fetcher: deps.fetcher,
			cache: deps.cache,
			rules: { minContentLength: deps.config.minContentLength },
			articleTtlMs: deps.config.cache.articleTtlMs,
			listingTtlMs: deps.config.cache.listingTtlMs,
			useCache: deps.config.cache.backend !== 'none',
		});

		let result: ScrapeResult;
		try {
			result = await orchestrator.run(limit, { signal: request.signal });
		} catch (err) {
			if (err instanceof ListingUnavailableError) {
				log.error(`[${site.name}] ${err.message}`);
				outcomes.push({ site: extractor.site, ok: false, error: err });
				continue;
			}
			throw err;
		}

		const savedTo = request.save
			? await saveResult(result, request.save, deps.config.outputDir, { envelope: request.envelope })
			: undefined;
		outcomes.push({ site: extractor.site, ok: true, result, savedTo });

		if (request.signal?.aborted) break;
	}

	const succeeded = outcomes.filter((outcome) => outcome.ok).length;
	log.info(`Scrape complete: ${succeeded}/${sites.length} sites succeeded`);

	return outcomes;
}
