/**
 * Wunderground Client: Wire Schema
 *
 * Structure of the v2 PWS `observations/current` document. The schema checks
 * shape only; whether a value is present, numeric, and plausible is decided by
 * the converter. Keys the schema does not name are dropped on parse.
 */

import { z } from 'zod';

/** Numbers arrive as JSON numbers, or as strings when a station firmware misbehaves. */
const numeric = z.union([z.number(), z.string()]).nullish();
const text = z.string().nullish();

export const UnitBlockSchema = z.object({
    temp: numeric,
    heatIndex: numeric,
    dewpt: numeric,
    windChill: numeric,
    windSpeed: numeric,
    windGust: numeric,
    pressure: numeric,
    precipRate: numeric,
    precipTotal: numeric,
    elev: numeric
});
export type RawUnitBlock = z.infer<typeof UnitBlockSchema>;

export const RawObservationSchema = z.object({
    stationID: text,
    obsTimeUtc: text,
    obsTimeLocal: text,
    neighborhood: text,
    softwareType: text,
    country: text,
    epoch: numeric,
    lat: numeric,
    lon: numeric,
    solarRadiation: numeric,
    uv: numeric,
    winddir: numeric,
    humidity: numeric,
    qcStatus: numeric,
    metric: UnitBlockSchema.nullish(),
    imperial: UnitBlockSchema.nullish()
});
export type RawObservation = z.infer<typeof RawObservationSchema>;

const ServiceErrorDetailSchema = z.object({
    code: text,
    message: text
});

/** weather.com nests the detail under `error`; older payloads put it at the top level. */
export const ServiceErrorSchema = ServiceErrorDetailSchema.extend({
    error: ServiceErrorDetailSchema.nullish()
});
export type ServiceError = z.infer<typeof ServiceErrorSchema>;

export const RawResponseSchema = z.object({
    observations: z.array(RawObservationSchema).nullish(),
    errors: z.array(ServiceErrorSchema).nullish(),
    success: z.boolean().nullish(),
    metadata: z.unknown().optional()
});
export type RawResponse = z.infer<typeof RawResponseSchema>;

export function describeServiceErrors(errors: readonly ServiceError[]): string {
    return errors
        .map((entry) => {
            const code = entry.error?.code ?? entry.code ?? 'unknown';
            const message = entry.error?.message ?? entry.message ?? 'no message';
            return `${code}: ${message}`;
        })
        .join('; ');
}

/** weather.com answers an unknown or revoked key with this code, sometimes under a 200. */
export const INVALID_API_KEY_CODE = 'CDN-0001';

export function rejectsApiKey(errors: readonly ServiceError[]): boolean {
    return errors.some((entry) => (entry.error?.code ?? entry.code) === INVALID_API_KEY_CODE);
}

/** True when at least one field of the unit block carries a value. */
export function blockHasValues(block: RawUnitBlock | null | undefined): boolean {
    if (!block) return false;
    return Object.values(block).some((value) => value !== null && value !== undefined);
}
