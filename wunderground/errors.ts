/**
 * Wunderground Client: Error Taxonomy
 *
 * Every failure of a fetch-and-convert cycle is one of four kinds. None of them
 * is retried here; callers decide what a failed cycle means. A station without
 * data is not an error and never surfaces as one of these.
 */

export type WeatherErrorKind = 'credential' | 'transport' | 'decode' | 'validation';

export interface WeatherErrorOptions {
    stationId?: string;
    cause?: unknown;
}

export abstract class WeatherError extends Error {
    abstract readonly kind: WeatherErrorKind;
    readonly stationId?: string;

    constructor(message: string, options: WeatherErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.stationId = options.stationId;
    }
}

/** The API key could not be obtained. */
export class CredentialError extends WeatherError {
    readonly kind = 'credential';
}

export interface TransportErrorOptions extends WeatherErrorOptions {
    status?: number;
    timedOut?: boolean;
}

/** Connection failure, timeout, or a non-success answer from the service. */
export class TransportError extends WeatherError {
    readonly kind = 'transport';
    readonly status?: number;
    readonly timedOut: boolean;

    constructor(message: string, options: TransportErrorOptions = {}) {
        super(message, options);
        this.status = options.status;
        this.timedOut = options.timedOut ?? false;
    }
}

/** The body is not the structured document the service is expected to send. */
export class DecodeError extends WeatherError {
    readonly kind = 'decode';
}

/** A structurally valid document holds a missing or implausible value. */
export class ValidationError extends WeatherError {
    readonly kind = 'validation';
    readonly field: string;

    constructor(field: string, message: string, options: WeatherErrorOptions = {}) {
        super(`${field}: ${message}`, options);
        this.field = field;
    }
}

export function isWeatherError(error: unknown): error is WeatherError {
    return error instanceof WeatherError;
}

/** Strip the api key from a URL before it goes into a message. */
export function redactUrl(url: string | URL): string {
    const parsed = new URL(url.toString());
    if (parsed.searchParams.has('apiKey')) {
        parsed.searchParams.set('apiKey', 'REDACTED');
    }
    return parsed.toString();
}
