/**
 * src/aggregate.ts
 *
 * ENTRY POINT — aggregation cycle
 *
 *   flights_raw ─▶ top destinations / busiest airlines / hourly traffic
 *     ─▶ stats_* tables (each fully replaced in its own transaction)
 *
 * USAGE
 * ──────
 *   npm run aggregate          # one cycle; exit code 1 if the raw table cannot be read
 *   npm run aggregate:watch    # a cycle every AGGREGATE_INTERVAL_MINUTES (default 5)
 */

import { log } from 'crawlee';
import { env } from './config/env.js';
import { aggregationOptions, databaseConfig } from './config/pipeline.js';
import { runAggregation } from './utils/aggregator.js';
import { PgDatastore } from './utils/db.js';
import { runEntrypoint } from './utils/entrypoint.js';
import { configureLogging } from './utils/logging.js';
import { createRunContext } from './utils/runContext.js';
import { runPeriodically, shutdownSignal } from './utils/scheduler.js';

configureLogging(env);

async function main(): Promise<void> {
    const options = aggregationOptions(env);
    const store = new PgDatastore(databaseConfig(env));
    const watch = process.argv.includes('--watch');

    const cycle = async (): Promise<void> => {
        const ctx = createRunContext('aggregate');
        log.info(`[Aggregator] Run ${ctx.runId} started.`);
        const outcome = await runAggregation(store, options);

        if (outcome.status === 'skipped') {
            log.info(`[Aggregator] Run ${ctx.runId}: nothing to aggregate (${outcome.reason}).`);
            return;
        }
        const failed = outcome.tables.filter((t) => t.status === 'failed');
        log.info(
            `[Aggregator] Run ${ctx.runId}: ${outcome.usableRows}/${outcome.rawRows} rows aggregated, ` +
            `${outcome.tables.length - failed.length}/${outcome.tables.length} tables replaced.`
        );
        if (failed.length > 0 && !watch) process.exitCode = 1;
    };

    try {
        if (watch) {
            const controller = shutdownSignal();
            await runPeriodically(cycle, {
                name: 'aggregation',
                intervalMs: env.AGGREGATE_INTERVAL_MINUTES * 60_000,
                signal: controller.signal,
            });
        } else {
            await cycle();
        }
    } finally {
        await store.end();
    }
}

await runEntrypoint(main);
