/**
 * Command Line: print the current observation of one station
 */

import { parseArgs } from 'util';
import {
    convert,
    createClient,
    fetchObservation,
    isWeatherError,
    parseUnit,
    resolveApiKey,
    type FetchLike
} from '@wunderground';

export const USAGE = `Usage: wu-observe [options] <station-id>

Options:
  -t, --timeout <ms>     request timeout in milliseconds (default: 10000)
  -u, --unit <unit>      m for metric, e for imperial (default: m)
  -k, --api-key <key>    api key to use instead of fetching one
  -r, --raw              print the observations as sent by the service
  -h, --help             show this help`;

function parseCliArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            timeout: { type: 'string', short: 't', default: '10000' },
            unit: { type: 'string', short: 'u', default: 'm' },
            'api-key': { type: 'string', short: 'k' },
            raw: { type: 'boolean', short: 'r', default: false },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });
}

export interface CliIo {
    stdout(text: string): void;
    stderr(text: string): void;
    /** Injected in tests; the global fetch otherwise. */
    fetch?: FetchLike;
}

/**
 * Run the CLI with the given arguments (without node and script path).
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
    let parsed: ReturnType<typeof parseCliArgs>;
    try {
        parsed = parseCliArgs(argv);
    } catch (error) {
        io.stderr(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
        return 2;
    }

    const { values, positionals } = parsed;
    if (values.help) {
        io.stdout(USAGE);
        return 0;
    }

    const [stationId, ...extra] = positionals;
    if (!stationId || extra.length > 0) {
        io.stderr(`expected exactly one station id\n\n${USAGE}`);
        return 2;
    }

    const timeoutMs = Number(values.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        io.stderr(`invalid timeout "${values.timeout}"`);
        return 2;
    }

    const unit = parseUnit(values.unit ?? 'm');
    if (!unit) {
        io.stderr(`invalid unit "${values.unit}", expected m or e`);
        return 2;
    }

    const client = createClient({ timeoutMs, fetch: io.fetch });
    try {
        const apiKey = await resolveApiKey(client, values['api-key']);
        const raw = await fetchObservation(client, apiKey, stationId, unit);
        if (!raw) {
            io.stderr('no result...');
            return 0;
        }

        const output = values.raw ? raw.observations : convert(raw, { unit, stationId });
        io.stdout(JSON.stringify(output, null, 2));
        return 0;
    } catch (error) {
        if (isWeatherError(error)) {
            io.stderr(`${error.kind} error: ${error.message}`);
            return 1;
        }
        throw error;
    }
}
