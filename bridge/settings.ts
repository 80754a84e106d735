/**
 * Bridge Settings
 *
 * Read once from the environment at startup. Invalid values stop the process
 * before the first cycle rather than at the first failing request.
 */

import { z } from 'zod';
import { parseUnit, type Unit } from '@wunderground';

export interface InfluxSettings {
    host: string;
    username: string;
    password: string;
    database: string;
}

export interface Settings {
    stations: string[];
    /** Request timeout, ms */
    timeoutMs: number;
    /** Delay between two cycles, ms */
    intervalMs: number;
    unit: Unit;
    /** Static api key; when unset the key is scraped from wunderground.com */
    apiKey?: string;
    /** Tries per station and cycle */
    attempts: number;
    influx: InfluxSettings;
}

const milliseconds = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    WU_STATIONS: z
        .string({ required_error: 'required' })
        .transform((value) =>
            value
                .split(',')
                .map((station) => station.trim())
                .filter((station) => station.length > 0)
        )
        .pipe(z.array(z.string()).min(1, 'must list at least one station')),
    WU_TIMEOUT: milliseconds(10_000),
    WU_INTERVAL: milliseconds(60_000),
    WU_ATTEMPTS: z.coerce.number().int().positive().default(3),
    WU_UNIT: z
        .string()
        .default('m')
        .transform((value, ctx) => {
            const unit = parseUnit(value);
            if (!unit) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown unit "${value}", expected m or e` });
                return z.NEVER;
            }
            return unit;
        }),
    WU_API_KEY: z.string().optional(),
    INFLUX_HOST: z.string().url().default('http://localhost:8086'),
    INFLUX_USERNAME: z.string().default('username'),
    INFLUX_PASSWORD: z.string().default('password'),
    INFLUX_DATABASE: z.string().min(1).default('default')
});

export type Environment = Record<string, string | undefined>;

export function readSettings(env: Environment = process.env): Settings {
    // Treat empty variables as unset so defaults apply.
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
        throw new Error(`Invalid bridge configuration: ${problems.join('; ')}`);
    }

    const values = parsed.data;
    return {
        stations: values.WU_STATIONS,
        timeoutMs: values.WU_TIMEOUT,
        intervalMs: values.WU_INTERVAL,
        unit: values.WU_UNIT,
        apiKey: values.WU_API_KEY?.trim() || undefined,
        attempts: values.WU_ATTEMPTS,
        influx: {
            host: values.INFLUX_HOST,
            username: values.INFLUX_USERNAME,
            password: values.INFLUX_PASSWORD,
            database: values.INFLUX_DATABASE
        }
    };
}
