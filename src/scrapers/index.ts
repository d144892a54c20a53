import { resolveSite, type SiteConfig, type SiteId } from '../config.js';
import type { SiteExtractor } from '../types.js';
import { IttefaqExtractor } from './ittefaq.js';
import { ProthomAloExtractor } from './prothom-alo.js';

const extractors: Record<SiteId, (config: SiteConfig) => SiteExtractor> = {
	'prothom-alo': (config) => new ProthomAloExtractor(config),
	ittefaq: (config) => new IttefaqExtractor(config),
};

/**
 * Extractor for a site id. Throws ConfigurationError for unknown ids.
 */
export function createExtractor(siteId: string): SiteExtractor {
	const config = resolveSite(siteId);
	return extractors[config.id](config);
}

export { IttefaqExtractor, ProthomAloExtractor };
