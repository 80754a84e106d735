/**
 * Wunderground Client: HTTP Handle
 *
 * A client is created once from configuration and passed into every operation.
 * Its timeout bounds the whole exchange, body included.
 */

import { TransportError, redactUrl } from './errors';

export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
    /** Upper bound for one request, connection and body read included. */
    timeoutMs?: number;
    userAgent?: string;
    /** Defaults to the global fetch at call time. */
    fetch?: FetchLike;
}

export interface HttpResponse {
    status: number;
    statusText: string;
    headers: Headers;
    body: string;
}

export interface HttpClient {
    readonly timeoutMs: number;
    get(url: string | URL, headers?: Record<string, string>): Promise<HttpResponse>;
}

export function createClient(options: HttpClientOptions = {}): HttpClient {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
    }

    const baseHeaders: Record<string, string> = {};
    if (options.userAgent) {
        baseHeaders['User-Agent'] = options.userAgent;
    }

    return {
        timeoutMs,
        get: (url, headers) =>
            fetchWithTimeout(url.toString(), timeoutMs, { ...baseHeaders, ...headers }, options.fetch)
    };
}

async function fetchWithTimeout(
    url: string,
    timeoutMs: number,
    headers: Record<string, string>,
    fetchImpl: FetchLike = globalThis.fetch
): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetchImpl(url, {
            method: 'GET',
            headers,
            signal: controller.signal
        });
        const body = await response.text();
        return {
            status: response.status,
            statusText: response.statusText,
            headers: response.headers,
            body
        };
    } catch (error) {
        if (controller.signal.aborted) {
            throw new TransportError(`GET ${redactUrl(url)} timed out after ${timeoutMs}ms`, {
                timedOut: true,
                cause: error
            });
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransportError(`GET ${redactUrl(url)} failed: ${reason}`, { cause: error });
    } finally {
        clearTimeout(timeoutId);
    }
}
