/**
 * Bridge: Fetch Loop
 *
 * Runs one acquisition cycle per interval for every configured station and
 * hands the observations to the point sink. A station that fails or has no
 * data is logged and skipped until the next cycle.
 */
/* eslint-disable no-console */

import { setTimeout as sleep } from 'timers/promises';
import {
    CredentialError,
    TransportError,
    fetchCurrentObservation,
    isWeatherError,
    resolveApiKey,
    type ApiKey,
    type FetchApiKeyOptions,
    type FetchObservationOptions,
    type HttpClient,
    type StationId,
    type Unit
} from '@wunderground';
import { toInfluxPoint, toMetricPoint, type PointSink } from './influx';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type StationOutcome = 'published' | 'skipped' | 'failed';

export interface CycleSummary {
    published: number;
    skipped: number;
    failed: number;
}

export interface BridgeOptions {
    client: HttpClient;
    sink: PointSink;
    stations: StationId[];
    unit: Unit;
    intervalMs: number;
    /** Static key; otherwise one is fetched and kept until the service rejects it. */
    apiKey?: string;
    credentials?: FetchApiKeyOptions;
    observations?: FetchObservationOptions;
    /** Tries per station and cycle; only transport failures are retried. Defaults to 3. */
    attempts?: number;
    logger?: Logger;
}

export const DEFAULT_ATTEMPTS = 3;

const REJECTED_KEY_STATUSES = new Set([401, 403]);

function rejectsKey(error: unknown): boolean {
    return (
        error instanceof CredentialError ||
        (error instanceof TransportError && error.status !== undefined && REJECTED_KEY_STATUSES.has(error.status))
    );
}

function isRetryable(error: unknown): boolean {
    return error instanceof TransportError && !rejectsKey(error);
}

export class Bridge {
    private readonly options: BridgeOptions;
    private readonly logger: Logger;
    private apiKey: Promise<ApiKey> | null = null;

    constructor(options: BridgeOptions) {
        if (options.stations.length === 0) {
            throw new Error('Bridge needs at least one station');
        }
        if (options.attempts !== undefined && (!Number.isInteger(options.attempts) || options.attempts < 1)) {
            throw new RangeError(`attempts must be a positive integer, got ${options.attempts}`);
        }
        this.options = options;
        this.logger = options.logger ?? console;
    }

    /**
     * Fetch, convert and write one station. Never throws.
     */
    async processStation(stationId: StationId): Promise<StationOutcome> {
        const attempts = this.options.attempts ?? DEFAULT_ATTEMPTS;
        for (let attempt = 1; ; attempt++) {
            try {
                return await this.publishStation(stationId);
            } catch (error) {
                if (attempt < attempts && isRetryable(error) && isWeatherError(error)) {
                    this.logger.warn(`[bridge] ${stationId}: attempt ${attempt}/${attempts} failed: ${error.message}`);
                    continue;
                }
                this.reportFailure(stationId, error);
                return 'failed';
            }
        }
    }

    private async publishStation(stationId: StationId): Promise<StationOutcome> {
        const { client, unit, observations } = this.options;
        const apiKey = await this.getApiKey();
        const observation = await fetchCurrentObservation(client, apiKey, stationId, unit, observations);
        if (!observation) {
            this.logger.log(`[bridge] ${stationId}: no data, skipping`);
            return 'skipped';
        }

        this.options.sink.writePoint(toInfluxPoint(toMetricPoint(observation)));
        this.logger.log(`[bridge] ${stationId}: published observation of ${observation.observedAt.toISOString()}`);
        return 'published';
    }

    /**
     * Process every station concurrently, then flush the sink once.
     */
    async runCycle(): Promise<CycleSummary> {
        const outcomes = await Promise.all(this.options.stations.map((stationId) => this.processStation(stationId)));

        const summary: CycleSummary = { published: 0, skipped: 0, failed: 0 };
        for (const outcome of outcomes) {
            summary[outcome]++;
        }

        if (summary.published > 0) {
            try {
                await this.options.sink.flush();
            } catch (error) {
                this.logger.error('[bridge] Failed to write points:', error);
                summary.failed += summary.published;
                summary.published = 0;
            }
        }

        this.logger.log(
            `[bridge] Cycle complete: ${summary.published} published, ${summary.skipped} skipped, ${summary.failed} failed`
        );
        return summary;
    }

    /**
     * Run cycles separated by the configured interval until the signal aborts.
     */
    async run(signal?: AbortSignal): Promise<void> {
        while (!signal?.aborted) {
            await this.runCycle();
            try {
                await sleep(this.options.intervalMs, undefined, { signal });
            } catch (error) {
                if (signal?.aborted) break;
                throw error;
            }
        }
        this.logger.log('[bridge] Stopped');
    }

    private getApiKey(): Promise<ApiKey> {
        if (!this.apiKey) {
            const pending = resolveApiKey(this.options.client, this.options.apiKey, this.options.credentials);
            this.apiKey = pending;
            // A failed lookup must not stick; the next station or cycle tries again.
            void pending.catch(() => this.forgetApiKey(pending));
        }
        return this.apiKey;
    }

    private forgetApiKey(expected?: Promise<ApiKey>): void {
        if (expected === undefined || this.apiKey === expected) {
            this.apiKey = null;
        }
    }

    private reportFailure(stationId: StationId, error: unknown): void {
        // rejected key, fetch a fresh one next cycle
        if (rejectsKey(error)) this.forgetApiKey();

        if (isWeatherError(error)) {
            this.logger.warn(`[bridge] ${stationId}: ${error.kind} error: ${error.message}`);
        } else {
            this.logger.error(`[bridge] ${stationId}: unexpected failure:`, error);
        }
    }
}
