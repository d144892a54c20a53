import { FetchError } from '../errors.js';
import { createLogger } from '../logger.js';
import { isWellFormedUrl } from '../models/validator.js';
import type { FetchOutcome, PageFetcher, RawDocument } from '../types.js';
import { decodeBody } from './charset.js';
import {
    DEFAULT_RETRY_POLICY,
    nextAttempt,
    transition,
    type AttemptOutcome,
    type RetryPolicy,
    type RetryState,
} from './retry-policy.js';
import { Throttle, systemClock, type Clock } from './throttle.js';
import {
    DEFAULT_HEADERS,
    classifyTransportError,
    createAxiosTransport,
    type HttpTransport,
} from './transport.js';

const log = createLogger('Fetcher');

export interface FetcherOptions {
    delayMs?: number;
    timeoutMs?: number;
    retry?: Partial<RetryPolicy>;
    headers?: Record<string, string>;
    transport?: HttpTransport;
    clock?: Clock;
}

/**
 * Throttled, retrying GET. Never touches the cache: callers decide what to
 * look up and what to store.
 */
export class HttpFetcher implements PageFetcher {
    private readonly policy: RetryPolicy;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;
    private readonly transport: HttpTransport;
    private readonly clock: Clock;
    private readonly throttle: Throttle;
    private requests = 0;

    constructor(options: FetcherOptions = {}) {
        this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
        this.timeoutMs = options.timeoutMs ?? 10_000;
        this.headers = { ...DEFAULT_HEADERS, ...options.headers };
        this.transport = options.transport ?? createAxiosTransport();
        this.clock = options.clock ?? systemClock;
        this.throttle = new Throttle(options.delayMs ?? 1000, this.clock);
    }

    // Requests that reached the transport, retries included.
    get requestCount(): number {
        return this.requests;
    }

    async fetch(url: string): Promise<FetchOutcome> {
        if (!isWellFormedUrl(url)) {
            log.warn(`Refusing malformed URL "${url}"`);
            return {
                ok: false,
                error: new FetchError({ kind: 'invalid-url', url, message: `Malformed URL "${url}"`, attempts: 0 }),
            };
        }

        let state: RetryState<RawDocument> = { phase: 'attempt', attempt: 1 };

        for (;;) {
            switch (state.phase) {
                case 'attempt': {
                    const outcome = await this.attempt(url);
                    state = transition(this.policy, state.attempt, outcome);
                    break;
                }
                case 'retry':
                    log.warn(
                        `GET ${url} failed (attempt ${state.attempt}/${this.policy.maxAttempts}): ${state.failure.message}. ` +
                        `Retrying in ${state.delayMs}ms`,
                    );
                    await this.clock.sleep(state.delayMs);
                    state = nextAttempt<RawDocument>(state);
                    break;
                case 'success':
                    log.info(`GET ${url} -> ${state.value.status} (attempt ${state.attempt}/${this.policy.maxAttempts})`);
                    return { ok: true, document: state.value };
                case 'fatal':
                    log.error(
                        `GET ${url} failed after ${state.attempt} attempt(s): ${state.failure.message}`,
                    );
                    return {
                        ok: false,
                        error: new FetchError({
                            kind: state.failure.kind,
                            url,
                            message: state.failure.message,
                            status: state.failure.status,
                            attempts: state.attempt,
                            cause: state.failure.cause,
                        }),
                    };
            }
        }
    }

    private async attempt(url: string): Promise<AttemptOutcome<RawDocument>> {
        try {
            this.requests++;
            const response = await this.throttle.execute(() =>
                this.transport({ url, timeoutMs: this.timeoutMs, headers: this.headers }),
            );

            if (response.status < 200 || response.status >= 300) {
                return {
                    ok: false,
                    failure: { kind: 'http-status', status: response.status, message: `HTTP ${response.status} for ${url}` },
                };
            }

            const { html, charset } = decodeBody(response.body, response.contentType);
            return {
                ok: true,
                value: {
                    url,
                    status: response.status,
                    charset,
                    html,
                    fetchedAt: new Date(this.clock.now()).toISOString(),
                },
            };
        } catch (err) {
            return { ok: false, failure: classifyTransportError(err) };
        }
    }
}
