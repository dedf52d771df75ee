/**
 * src/stats.ts
 *
 * Read-only report over the store: global metrics, the derived tables and
 * the latest raw rows.
 *
 * USAGE
 * ──────
 *   npm run stats                  # latest 1000 raw rows
 *   npm run stats -- --limit 100   # one of 100, 500, 1000, 5000
 */

import { log } from 'crawlee';
import { env } from './config/env.js';
import { databaseConfig, retryPolicy } from './config/pipeline.js';
import { PgDatastore } from './utils/db.js';
import { runEntrypoint } from './utils/entrypoint.js';
import { configureLogging } from './utils/logging.js';
import {
    DEFAULT_RAW_ROW_LIMIT,
    isRawRowLimit,
    loadDerivedStats,
    loadGlobalMetrics,
    loadRecentFlights,
    RAW_ROW_LIMITS,
} from './utils/statsReader.js';
import { renderDerived, renderMetrics, renderRecent } from './utils/statsReport.js';

configureLogging(env);

// ─── Argument Parsing ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const limitArg = (() => {
    const i = args.indexOf('--limit');
    return i !== -1 && args[i + 1] ? Number(args[i + 1]) : null;
})();

async function main(): Promise<void> {
    const limit = limitArg ?? DEFAULT_RAW_ROW_LIMIT;
    if (!isRawRowLimit(limit)) {
        log.error(`[Stats] --limit must be one of ${RAW_ROW_LIMITS.join(', ')} (got ${limitArg}).`);
        process.exitCode = 1;
        return;
    }

    const store = new PgDatastore(databaseConfig(env));
    const policy = retryPolicy(env);
    try {
        const metrics = await loadGlobalMetrics(store, policy);
        const derived = await loadDerivedStats(store, policy);
        const recent = await loadRecentFlights(store, policy, limit);

        const lines = [
            `Departures report — ${env.AIRPORT_CODE}`,
            ...renderMetrics(metrics, env.AIRPORT_TIMEZONE),
            ...renderDerived(derived),
            ...renderRecent(recent, env.AIRPORT_TIMEZONE),
        ];
        console.log(lines.join('\n'));
    } finally {
        await store.end();
    }
}

await runEntrypoint(main);
