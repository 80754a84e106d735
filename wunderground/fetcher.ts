/**
 * Wunderground Client: Observation Fetcher
 *
 * Issues the `observations/current` request for one station and returns the
 * structurally validated document, or null when the station has nothing to
 * report right now.
 */

import { DecodeError, TransportError, redactUrl } from './errors';
import type { HttpClient, HttpResponse } from './http';
import { RawResponseSchema, blockHasValues, describeServiceErrors, rejectsApiKey, type RawResponse } from './schema';
import type { ApiKey, StationId } from './types';
import { UNITS, unitSystem, type Unit } from './units';

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_OBSERVATIONS_URL = 'https://api.weather.com/v2/pws/observations';

export type Precision = 'decimal' | 'integer';

export interface FetchObservationOptions {
    /** Base of the observations API, without the `/current` segment. */
    baseUrl?: string;
    /** `decimal` asks for one decimal place; the API default is integers. */
    precision?: Precision;
}

// =============================================================================
// Request
// =============================================================================

export function buildObservationUrl(
    apiKey: ApiKey,
    stationId: StationId,
    unit: Unit,
    options: FetchObservationOptions = {}
): URL {
    const { baseUrl = DEFAULT_OBSERVATIONS_URL, precision = 'decimal' } = options;

    const url = new URL(`${baseUrl.replace(/\/+$/, '')}/current`);
    url.searchParams.set('apiKey', apiKey);
    url.searchParams.set('stationId', stationId);
    url.searchParams.set('units', unitSystem(unit).queryCode);
    url.searchParams.set('format', 'json');
    if (precision === 'decimal') {
        url.searchParams.set('numericPrecision', 'decimal');
    }
    return url;
}

/**
 * Fetch the current observation of a station.
 *
 * Resolves to null when the service has no data for the station: a 204, an
 * empty body, an empty `observations` list, or an observation whose unit
 * blocks hold no value at all.
 *
 * @throws TransportError on connection failure, timeout, non-2xx status, or a
 *   2xx document that reports service errors (status 401 when the key is rejected)
 * @throws DecodeError when the body is not the expected JSON document
 */
export async function fetchObservation(
    client: HttpClient,
    apiKey: ApiKey,
    stationId: StationId,
    unit: Unit,
    options: FetchObservationOptions = {}
): Promise<RawResponse | null> {
    if (!apiKey) throw new TypeError('apiKey must not be empty');
    if (!stationId) throw new TypeError('stationId must not be empty');

    const url = buildObservationUrl(apiKey, stationId, unit, options);

    let response: HttpResponse;
    try {
        response = await client.get(url, { Accept: 'application/json', 'Accept-Encoding': 'gzip' });
    } catch (error) {
        if (error instanceof TransportError) {
            throw new TransportError(error.message, { stationId, timedOut: error.timedOut, cause: error });
        }
        throw error;
    }

    if (response.status === 204) return null;

    if (response.status < 200 || response.status >= 300) {
        throw new TransportError(
            `GET ${redactUrl(url)} answered ${response.status} ${response.statusText}`,
            { stationId, status: response.status }
        );
    }

    if (response.body.trim() === '') return null;

    const document = decode(response.body, stationId);

    if (document.success === false || (document.errors?.length ?? 0) > 0) {
        const errors = document.errors ?? [];
        const detail = errors.length > 0 ? describeServiceErrors(errors) : 'success=false';
        throw new TransportError(`service reported errors for ${stationId}: ${detail}`, {
            stationId,
            // a rejected key reads as 401 whatever status carried it
            status: rejectsApiKey(errors) ? 401 : response.status
        });
    }

    const first = document.observations?.[0];
    if (!first) return null;

    const hasValues = UNITS.some((family) => blockHasValues(first[unitSystem(family).block]));
    if (!hasValues) return null;

    return document;
}

// =============================================================================
// Utilities
// =============================================================================

function decode(body: string, stationId: StationId): RawResponse {
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (error) {
        throw new DecodeError(`response for ${stationId} is not JSON`, { stationId, cause: error });
    }

    const parsed = RawResponseSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
        throw new DecodeError(
            `response for ${stationId} does not match the observation document at ${where}: ${issue?.message ?? 'invalid'}`,
            { stationId, cause: parsed.error }
        );
    }
    return parsed.data;
}
