/**
 * Wunderground Client: Response Converter
 *
 * Turns a structurally valid document into an Observation. A value that is
 * present but unusable fails the whole conversion; a value that is absent (or
 * null on the wire) is left out of the result.
 */

import { ValidationError } from './errors';
import { blockHasValues, type RawObservation, type RawResponse, type RawUnitBlock } from './schema';
import type { Measurements, Observation, StationId, StationLocation } from './types';
import {
    COMMON_RANGES,
    UNITS,
    isInRange,
    unitSystem,
    type CommonField,
    type Range,
    type Unit,
    type UnitField
} from './units';

export interface ConvertOptions {
    /** Unit family the request was made with. */
    unit: Unit;
    /** When given, the document must be about this station. */
    stationId?: StationId;
}

type RawValue = number | string | null | undefined;

const UNIT_FIELDS: ReadonlyArray<readonly [keyof Measurements, UnitField]> = [
    ['temperature', 'temp'],
    ['dewPoint', 'dewpt'],
    ['heatIndex', 'heatIndex'],
    ['windChill', 'windChill'],
    ['windSpeed', 'windSpeed'],
    ['windGust', 'windGust'],
    ['pressure', 'pressure'],
    ['precipRate', 'precipRate'],
    ['precipTotal', 'precipTotal'],
    ['elevation', 'elev']
];

const COMMON_FIELDS: ReadonlyArray<readonly [keyof Measurements, CommonField]> = [
    ['humidity', 'humidity'],
    ['windDirection', 'winddir'],
    ['uv', 'uv'],
    ['solarRadiation', 'solarRadiation']
];

// ISO 8601 date-time with an explicit offset; local times are ambiguous.
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-](\d{2}):?(\d{2}))$/;

// plain decimal notation only, no hex or exponent
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

export function convert(raw: RawResponse, options: ConvertOptions): Observation {
    const entry = raw.observations?.[0];
    if (!entry) {
        throw new ValidationError('observations', 'document carries no observation', {
            stationId: options.stationId
        });
    }

    const stationId = readText(entry.stationID);
    if (stationId === undefined) {
        throw new ValidationError('stationID', 'missing', { stationId: options.stationId });
    }
    if (options.stationId !== undefined && stationId !== options.stationId) {
        throw new ValidationError('stationID', `expected ${options.stationId}, got ${stationId}`, {
            stationId: options.stationId
        });
    }

    const rawTime = readText(entry.obsTimeUtc);
    if (rawTime === undefined) {
        throw new ValidationError('obsTimeUtc', 'missing', { stationId });
    }
    const observedAt = parseTimestamp(rawTime);
    if (!observedAt) {
        throw new ValidationError('obsTimeUtc', `unparseable timestamp ${JSON.stringify(rawTime)}`, { stationId });
    }

    const system = unitSystem(options.unit);
    const block = entry[system.block];
    if (!block || !blockHasValues(block)) {
        const others = UNITS.filter((family) => family !== options.unit && blockHasValues(entry[unitSystem(family).block]));
        const detail = others.length > 0 ? `missing; document carries ${others.join(', ')} values instead` : 'missing';
        throw new ValidationError(system.block, detail, { stationId });
    }

    const measurements: Measurements = {};
    for (const [key, field] of COMMON_FIELDS) {
        const value = readMeasurement(entry[field], field, COMMON_RANGES[field], stationId);
        if (value !== undefined) measurements[key] = value;
    }
    for (const [key, field] of UNIT_FIELDS) {
        const value = readUnitField(block, field, system.block, system.ranges[field], stationId);
        if (value !== undefined) measurements[key] = value;
    }

    return {
        stationId,
        observedAt,
        unit: options.unit,
        location: readLocation(entry, stationId),
        measurements
    };
}

/**
 * Parse an ISO 8601 timestamp that names its offset.
 * Returns null for anything else, including local times without a zone.
 */
export function parseTimestamp(value: string): Date | null {
    const trimmed = value.trim();
    const match = TIMESTAMP_PATTERN.exec(trimmed);
    if (!match) return null;

    const [, year, month, day, hour, minute, second, offsetHours, offsetMinutes] = match.map((part) =>
        part === undefined ? 0 : Number(part)
    );
    // Date.parse rolls 02-30 over into March; reject instead of moving the instant.
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    if (month < 1 || month > 12 || day < 1 || day > daysInMonth) return null;
    if (hour > 23 || minute > 59 || second > 59) return null;
    if (offsetHours > 23 || offsetMinutes > 59) return null;

    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) ? null : new Date(ms);
}

// =============================================================================
// Field readers
// =============================================================================

function readText(value: string | null | undefined): string | undefined {
    if (value === null || value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

function readUnitField(
    block: RawUnitBlock,
    field: UnitField,
    blockName: Unit,
    range: Range,
    stationId: StationId
): number | undefined {
    return readMeasurement(block[field], `${blockName}.${field}`, range, stationId);
}

function readMeasurement(value: RawValue, field: string, range: Range, stationId: StationId): number | undefined {
    if (value === null || value === undefined) return undefined;

    const parsed = typeof value === 'number' ? value : DECIMAL_PATTERN.test(value.trim()) ? Number(value) : NaN;
    if (!Number.isFinite(parsed)) {
        throw new ValidationError(field, `not a finite number: ${JSON.stringify(value)}`, { stationId });
    }
    if (!isInRange(parsed, range)) {
        throw new ValidationError(field, `${parsed} outside [${range.min}, ${range.max}]`, { stationId });
    }
    return parsed;
}

function readLocation(entry: RawObservation, stationId: StationId): StationLocation {
    const location: StationLocation = {};

    const latitude = readMeasurement(entry.lat, 'lat', COMMON_RANGES.lat, stationId);
    const longitude = readMeasurement(entry.lon, 'lon', COMMON_RANGES.lon, stationId);
    const neighborhood = readText(entry.neighborhood);
    const country = readText(entry.country);

    if (latitude !== undefined) location.latitude = latitude;
    if (longitude !== undefined) location.longitude = longitude;
    if (neighborhood !== undefined) location.neighborhood = neighborhood;
    if (country !== undefined) location.country = country;

    return location;
}
