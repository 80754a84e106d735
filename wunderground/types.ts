/**
 * Wunderground Client: Domain Types
 */

import type { Unit } from './units';

/** Opaque credential accepted by api.weather.com. */
export type ApiKey = string;

/** PWS identifier, e.g. "KCASANFR1234". */
export type StationId = string;

/**
 * Flat set of readings. A key is absent when the station did not report it;
 * a present value has been checked against the range of its unit family.
 */
export interface Measurements {
    temperature?: number;
    dewPoint?: number;
    heatIndex?: number;
    windChill?: number;
    /** Relative humidity, % */
    humidity?: number;
    pressure?: number;
    windSpeed?: number;
    windGust?: number;
    /** Degrees from north */
    windDirection?: number;
    precipRate?: number;
    precipTotal?: number;
    /** W/m² */
    solarRadiation?: number;
    uv?: number;
    elevation?: number;
}

export const MEASUREMENT_KEYS: readonly (keyof Measurements)[] = [
    'temperature',
    'dewPoint',
    'heatIndex',
    'windChill',
    'humidity',
    'pressure',
    'windSpeed',
    'windGust',
    'windDirection',
    'precipRate',
    'precipTotal',
    'solarRadiation',
    'uv',
    'elevation'
];

export interface StationLocation {
    latitude?: number;
    longitude?: number;
    neighborhood?: string;
    country?: string;
}

/** A validated reading of one station at one point in time. */
export interface Observation {
    stationId: StationId;
    observedAt: Date;
    /** Scale of every unit-dependent value in `measurements`. */
    unit: Unit;
    location: StationLocation;
    measurements: Measurements;
}
