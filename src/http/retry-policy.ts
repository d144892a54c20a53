import type { FetchErrorKind } from '../errors.js';

export interface RetryPolicy {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30_000,
    factor: 2,
};

export interface AttemptFailure {
    kind: FetchErrorKind;
    message: string;
    status?: number;
    cause?: unknown;
}

export type AttemptOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; failure: AttemptFailure };

/**
 * Attempt → Success | Retry(n) → Attempt | Fatal.
 * `attempt` is 1-based and counts the request that produced the state.
 */
export type RetryState<T> =
    | { phase: 'attempt'; attempt: number }
    | { phase: 'success'; attempt: number; value: T }
    | { phase: 'retry'; attempt: number; delayMs: number; failure: AttemptFailure }
    | { phase: 'fatal'; attempt: number; failure: AttemptFailure };

const RETRYABLE_STATUSES = new Set([408, 429]);

export function isRetryable(failure: AttemptFailure): boolean {
    switch (failure.kind) {
        case 'network':
        case 'timeout':
            return true;
        case 'invalid-url':
            return false;
        case 'http-status':
            return failure.status !== undefined
                && (failure.status >= 500 || RETRYABLE_STATUSES.has(failure.status));
    }
}

// Delay before attempt `attempt + 1`.
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
    const delay = policy.initialDelayMs * Math.pow(policy.factor, attempt - 1);
    return Math.min(delay, policy.maxDelayMs);
}

export function transition<T>(
    policy: RetryPolicy,
    attempt: number,
    outcome: AttemptOutcome<T>,
): RetryState<T> {
    if (outcome.ok) {
        return { phase: 'success', attempt, value: outcome.value };
    }

    if (!isRetryable(outcome.failure) || attempt >= policy.maxAttempts) {
        return { phase: 'fatal', attempt, failure: outcome.failure };
    }

    return {
        phase: 'retry',
        attempt,
        delayMs: backoffDelay(policy, attempt),
        failure: outcome.failure,
    };
}

export function nextAttempt<T>(state: { phase: 'retry'; attempt: number }): RetryState<T> {
    return { phase: 'attempt', attempt: state.attempt + 1 };
}
