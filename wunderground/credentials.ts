/**
 * Wunderground Client: Credential Resolver
 *
 * The public wunderground.com pages embed the api key their own widgets use
 * (`...?apiKey=<hex>&...`). Without a configured key, the resolver reads it
 * from there. Nothing is cached here.
 */

import { CredentialError, TransportError } from './errors';
import type { HttpClient, HttpResponse } from './http';
import type { ApiKey } from './types';

export const DEFAULT_CREDENTIAL_URL = 'https://www.wunderground.com';

const API_KEY_PATTERN = /apiKey=([a-z0-9]+)/;

export interface FetchApiKeyOptions {
    url?: string;
}

/**
 * Extract the first api key embedded in a page or header value.
 */
export function parseApiKey(text: string): ApiKey | null {
    const match = API_KEY_PATTERN.exec(text);
    return match ? match[1] : null;
}

export async function fetchApiKey(client: HttpClient, options: FetchApiKeyOptions = {}): Promise<ApiKey> {
    const url = options.url ?? DEFAULT_CREDENTIAL_URL;

    let response: HttpResponse;
    try {
        response = await client.get(url, { Accept: 'text/html' });
    } catch (error) {
        const reason = error instanceof TransportError ? error.message : String(error);
        throw new CredentialError(`unable to load ${url}: ${reason}`, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
        throw new CredentialError(`${url} answered ${response.status} ${response.statusText}`);
    }

    const fromBody = parseApiKey(response.body);
    if (fromBody) return fromBody;

    for (const value of response.headers.values()) {
        const fromHeader = parseApiKey(value);
        if (fromHeader) return fromHeader;
    }

    throw new CredentialError(`no api key found in ${url}`);
}

/**
 * Use the configured key when there is one, otherwise fetch a fresh one.
 */
export async function resolveApiKey(
    client: HttpClient,
    configured?: string,
    options: FetchApiKeyOptions = {}
): Promise<ApiKey> {
    const trimmed = configured?.trim();
    if (trimmed) return trimmed;
    return fetchApiKey(client, options);
}
