/**
 * Wunderground Client: Fetch-and-Convert
 */

import { convert } from './convert';
import { fetchObservation, type FetchObservationOptions } from './fetcher';
import type { HttpClient } from './http';
import type { ApiKey, Observation, StationId } from './types';
import type { Unit } from './units';

/**
 * One acquisition cycle for a station: request, decode, convert.
 * Null means the station has no data right now.
 */
export async function fetchCurrentObservation(
    client: HttpClient,
    apiKey: ApiKey,
    stationId: StationId,
    unit: Unit,
    options: FetchObservationOptions = {}
): Promise<Observation | null> {
    const raw = await fetchObservation(client, apiKey, stationId, unit, options);
    if (!raw) return null;
    return convert(raw, { unit, stationId });
}
