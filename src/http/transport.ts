import axios, { type AxiosInstance } from 'axios';
import type { AttemptFailure } from './retry-policy.js';

export const DEFAULT_HEADERS: Record<string, string> = {
    'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'bn,en;q=0.8',
};

export interface TransportRequest {
    url: string;
    timeoutMs: number;
    headers: Record<string, string>;
}

export interface TransportResponse {
    status: number;
    contentType?: string;
    body: Uint8Array;
}

/**
 * One GET with no retries. Resolves for every HTTP status and rejects only
 * when no response arrived (timeout, DNS, reset).
 */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

export function createAxiosTransport(client: AxiosInstance = axios.create()): HttpTransport {
    return async (request) => {
        const response = await client.get<ArrayBuffer>(request.url, {
            responseType: 'arraybuffer',
            timeout: request.timeoutMs,
            headers: request.headers,
            maxRedirects: 5,
            validateStatus: () => true,
        });

        const contentType = response.headers['content-type'];
        return {
            status: response.status,
            contentType: typeof contentType === 'string' ? contentType : undefined,
            body: new Uint8Array(response.data),
        };
    };
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export function classifyTransportError(err: unknown): AttemptFailure {
    if (axios.isAxiosError(err)) {
        if (err.code && TIMEOUT_CODES.has(err.code)) {
            return { kind: 'timeout', message: err.message, cause: err };
        }
        if (err.code === 'ERR_INVALID_URL') {
            return { kind: 'invalid-url', message: err.message, cause: err };
        }
        return { kind: 'network', message: err.message, cause: err };
    }

    const message = err instanceof Error ? err.message : String(err);
    return { kind: 'network', message, cause: err };
}
