export class ScraperError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type FetchErrorKind = 'network' | 'timeout' | 'http-status' | 'invalid-url';

export interface FetchErrorInit {
    kind: FetchErrorKind;
    url: string;
    message: string;
    attempts: number;
    status?: number;
    cause?: unknown;
}

export class FetchError extends ScraperError {
    readonly kind: FetchErrorKind;
    readonly url: string;
    readonly attempts: number;
    readonly status?: number;

    constructor(init: FetchErrorInit) {
        super(init.message, { cause: init.cause });
        this.kind = init.kind;
        this.url = init.url;
        this.attempts = init.attempts;
        this.status = init.status;
    }
}

export type ExtractionErrorKind = 'missing-field' | 'malformed-html';

export class ExtractionError extends ScraperError {
    readonly kind: ExtractionErrorKind;
    readonly url: string;
    readonly field?: string;

    constructor(kind: ExtractionErrorKind, url: string, message: string, field?: string) {
        super(message);
        this.kind = kind;
        this.url = url;
        this.field = field;
    }
}

// Unknown site, bad limit, invalid env. Raised before any request is made.
export class ConfigurationError extends ScraperError {}

export class CacheError extends ScraperError {}

export class ListingUnavailableError extends ScraperError {
    readonly url: string;

    constructor(url: string, cause: FetchError) {
        super(`Listing page ${url} could not be fetched: ${cause.message}`, { cause });
        this.url = url;
    }
}
