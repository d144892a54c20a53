import { createHash } from 'node:crypto';

const TRACKING_PARAMS = new Set([
    'fbclid',
    'gclid',
    'dclid',
    'msclkid',
    'mc_cid',
    'mc_eid',
    'igshid',
    'ref',
    'ref_src',
    '_ga',
    'spm',
]);

export function isTrackingParam(name: string): boolean {
    const lower = name.toLowerCase();
    return lower.startsWith('utm_') || TRACKING_PARAMS.has(lower);
}

/**
 * Canonical form of a URL for cache keys and de-duplication: no fragment, no
 * tracking parameters, sorted query, no trailing slash on non-root paths.
 * Strings that do not parse as URLs are returned trimmed.
 */
export function normalizeUrl(raw: string): string {
    let url: URL;
    try {
        url = new URL(raw.trim());
    } catch {
        return raw.trim();
    }

    url.hash = '';
    for (const name of [...url.searchParams.keys()]) {
        if (isTrackingParam(name)) {
            url.searchParams.delete(name);
        }
    }
    url.searchParams.sort();
    if (url.searchParams.toString() === '') {
        url.search = '';
    }

    if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
        url.pathname = url.pathname.replace(/\/+$/, '') || '/';
    }

    return url.toString();
}

export function cacheKey(url: string): string {
    return createHash('sha256').update(normalizeUrl(url)).digest('hex');
}
