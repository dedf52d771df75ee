/**
 * src/main.ts
 *
 * ENTRY POINT — extraction cycle
 *
 *   Playwright (via Crawlee) ─▶ reveal-all loop ─▶ row parser
 *     ─▶ normalizer ─▶ INSERT … ON CONFLICT DO NOTHING into flights_raw
 *
 * USAGE
 * ──────
 *   npm run extract            # one run, exit code 1 if the listing never loads
 *   npm run extract:watch      # a run every EXTRACT_INTERVAL_MINUTES
 *   npm run extract -- -v      # DEBUG logging
 *
 * In watch mode a failed run is logged and the next one is still attempted.
 */

import { log } from 'crawlee';
import { env } from './config/env.js';
import { databaseConfig, extractionConfig } from './config/pipeline.js';
import { crawlDepartures } from './crawler.js';
import { runExtractionCycle } from './orchestrator.js';
import { PgDatastore } from './utils/db.js';
import { runEntrypoint } from './utils/entrypoint.js';
import { configureLogging } from './utils/logging.js';
import { runPeriodically, shutdownSignal } from './utils/scheduler.js';

configureLogging(env);

async function main(): Promise<void> {
    const config = extractionConfig(env);
    const store = new PgDatastore(databaseConfig(env));
    const watch = process.argv.includes('--watch');

    log.info('═'.repeat(60));
    log.info(`  Departures extraction — ${config.airport} (${config.timeZone})`);
    log.info(`  Listing  : ${config.site.url}`);
    log.info(`  Database : ${env.DATABASE_URL ? '(DATABASE_URL)' : `${env.PGHOST}:${env.PGPORT}/${env.PGDATABASE}`}`);
    log.info(`  Mode     : ${watch ? `every ${env.EXTRACT_INTERVAL_MINUTES} min` : 'single run'}`);
    log.info('═'.repeat(60));

    const cycle = async (): Promise<void> => {
        await runExtractionCycle(config, { store, crawl: crawlDepartures });
    };

    try {
        if (watch) {
            const controller = shutdownSignal();
            await runPeriodically(cycle, {
                name: 'extraction',
                intervalMs: env.EXTRACT_INTERVAL_MINUTES * 60_000,
                signal: controller.signal,
            });
        } else {
            await cycle();
        }
    } finally {
        await store.end();
    }

    log.info('Extraction pipeline completed.');
}

await runEntrypoint(main);
