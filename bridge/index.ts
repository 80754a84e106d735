/**
 * Bridge: Process Entry Point
 *
 * Usage: WU_STATIONS=IPARIS18204,KCASANFR1234 npm run bridge
 */
/* eslint-disable no-console */

import { createClient } from '@wunderground';
import { Bridge } from './bridge';
import { createInfluxSink } from './influx';
import { readSettings } from './settings';

async function main(): Promise<void> {
    const settings = readSettings();
    const client = createClient({ timeoutMs: settings.timeoutMs });
    const sink = createInfluxSink(settings.influx);

    const bridge = new Bridge({
        client,
        sink,
        stations: settings.stations,
        unit: settings.unit,
        intervalMs: settings.intervalMs,
        apiKey: settings.apiKey,
        attempts: settings.attempts
    });

    const controller = new AbortController();
    const stop = () => controller.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    console.log(
        `[bridge] Watching ${settings.stations.join(', ')} every ${settings.intervalMs}ms (${settings.unit}) → ${settings.influx.host}/${settings.influx.database}`
    );

    try {
        await bridge.run(controller.signal);
    } finally {
        await sink.close();
    }
}

main().catch((error) => {
    console.error('[bridge] Fatal:', error);
    process.exitCode = 1;
});
