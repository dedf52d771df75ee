/**
 * src/config/pipeline.ts
 *
 * Maps the validated environment onto the explicit config objects each
 * component takes. Components never read process.env themselves.
 */

import type { AggregationOptions } from '../utils/aggregator.js';
import type { DatabaseConfig } from '../utils/db.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { ExtractionCycleConfig } from '../orchestrator.js';
import { buildChopinSite } from './chopin.js';
import type { Env } from './envSchema.js';

export function databaseConfig(env: Env): DatabaseConfig {
    return {
        connectionString: env.DATABASE_URL,
        host: env.PGHOST,
        port: env.PGPORT,
        user: env.PGUSER,
        password: env.PGPASSWORD,
        database: env.PGDATABASE,
        ssl: env.PGSSL,
        poolMax: env.PG_POOL_MAX,
        connectTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
        statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
    };
}

export function retryPolicy(env: Env): RetryPolicy {
    return {
        maxAttempts: env.DB_RETRY_MAX_ATTEMPTS,
        baseDelayMs: env.DB_RETRY_BASE_DELAY_MS,
    };
}

export function extractionConfig(env: Env): ExtractionCycleConfig {
    return {
        site: buildChopinSite(env.LISTING_URL),
        airport: env.AIRPORT_CODE,
        timeZone: env.AIRPORT_TIMEZONE,
        retry: retryPolicy(env),
        readyTimeoutMs: env.PAGE_READY_TIMEOUT_MS,
        settleTimeoutMs: env.REVEAL_SETTLE_TIMEOUT_MS,
        runBudgetMs: env.RUN_BUDGET_MS,
        maxIterations: env.MAX_REVEAL_ITERATIONS,
        navigationRetries: env.NAVIGATION_RETRIES,
        headless: env.HEADLESS,
        userAgent: env.CHROME_USER_AGENT,
        debugDir: env.DEBUG_DIR,
    };
}

export function aggregationOptions(env: Env): AggregationOptions {
    return {
        retry: retryPolicy(env),
        topN: env.TOP_N,
        timeZone: env.AIRPORT_TIMEZONE,
    };
}
