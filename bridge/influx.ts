/**
 * Bridge: InfluxDB Publishing
 *
 * One observation becomes one point: tagged by station, timestamped with the
 * observation's own time, one float field per populated measurement.
 */

import { InfluxDB, Point } from '@influxdata/influxdb-client';
import { MEASUREMENT_KEYS, type Observation } from '@wunderground';
import type { InfluxSettings } from './settings';

export const MEASUREMENT = 'weather_underground';

/** Storage-neutral shape of a point, kept separate for inspection in tests and logs. */
export interface MetricPoint {
    measurement: string;
    tags: Record<string, string>;
    fields: Record<string, number>;
    timestamp: Date;
}

/** Subset of the client's WriteApi the bridge relies on. */
export interface PointSink {
    writePoint(point: Point): void;
    flush(): Promise<void>;
    close(): Promise<void>;
}

export function toMetricPoint(observation: Observation): MetricPoint {
    const tags: Record<string, string> = {
        station: observation.stationId,
        unit: observation.unit
    };
    if (observation.location.country) tags.country = observation.location.country;
    if (observation.location.neighborhood) tags.neighborhood = observation.location.neighborhood;

    const fields: Record<string, number> = {};
    for (const key of MEASUREMENT_KEYS) {
        const value = observation.measurements[key];
        if (value !== undefined) fields[key] = value;
    }
    if (observation.location.latitude !== undefined) fields.latitude = observation.location.latitude;
    if (observation.location.longitude !== undefined) fields.longitude = observation.location.longitude;

    return {
        measurement: MEASUREMENT,
        tags,
        fields,
        timestamp: observation.observedAt
    };
}

export function toInfluxPoint(metric: MetricPoint): Point {
    const point = new Point(metric.measurement).timestamp(metric.timestamp);
    for (const [name, value] of Object.entries(metric.tags)) {
        point.tag(name, value);
    }
    for (const [name, value] of Object.entries(metric.fields)) {
        point.floatField(name, value);
    }
    return point;
}

/**
 * Open a write API against an InfluxDB 1.x database through the 2.x client's
 * compatibility endpoint (`<database>/autogen`, `user:password` token).
 */
export function createInfluxSink(settings: InfluxSettings): PointSink {
    const client = new InfluxDB({
        url: settings.host,
        token: `${settings.username}:${settings.password}`
    });
    return client.getWriteApi('', `${settings.database}/autogen`, 'ms');
}
