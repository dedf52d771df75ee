/**
 * src/orchestrator.ts
 *
 * EXTRACTION CYCLE
 *
 *   crawl listing ─▶ normalize ─▶ persist (idempotent)
 *
 * One call is one pipeline run. The cycle shares nothing with the
 * aggregation cycle except the `flights_raw` table.
 */

import { log } from 'crawlee';
import type { ListingSite } from './config/chopin.js';
import type { CrawlFn } from './crawler.js';
import type { StopReason } from './extractors/convergence.js';
import type { Datastore } from './utils/db.js';
import { persistFlights } from './utils/flightStore.js';
import { normalizeCandidates } from './utils/normalize.js';
import type { RetryPolicy } from './utils/retry.js';
import { createRunContext, todayMarker } from './utils/runContext.js';

export interface ExtractionCycleConfig {
    site: ListingSite;
    airport: string;
    timeZone: string;
    retry: RetryPolicy;
    readyTimeoutMs: number;
    settleTimeoutMs: number;
    runBudgetMs: number;
    maxIterations: number;
    navigationRetries: number;
    headless: boolean;
    userAgent?: string;
    debugDir: string;
}

export interface ExtractionCycleResult {
    runId: string;
    todayMarker: string;
    candidates: number;
    normalized: number;
    inserted: number;
    rowsSkipped: number;
    stopReason: StopReason;
    degraded: boolean;
}

export interface ExtractionCycleDeps {
    store: Datastore;
    crawl: CrawlFn;
    now?: () => Date;
}

export async function runExtractionCycle(
    config: ExtractionCycleConfig,
    deps: ExtractionCycleDeps
): Promise<ExtractionCycleResult> {
    const ctx = createRunContext('extract');
    const startedAt = deps.now?.() ?? new Date();
    const marker = todayMarker(config.timeZone, startedAt);
    log.info(`[Orchestrator] Run ${ctx.runId}: harvesting ${config.airport} departures for ${marker}.`);

    const extraction = await deps.crawl({
        site: config.site,
        airport: config.airport,
        todayMarker: marker,
        runId: ctx.runId,
        readyTimeoutMs: config.readyTimeoutMs,
        settleTimeoutMs: config.settleTimeoutMs,
        runBudgetMs: config.runBudgetMs,
        deadline: startedAt.getTime() + config.runBudgetMs,
        maxIterations: config.maxIterations,
        navigationRetries: config.navigationRetries,
        headless: config.headless,
        userAgent: config.userAgent,
        debugDir: config.debugDir,
    });

    const records = normalizeCandidates(extraction.candidates, { timeZone: config.timeZone });
    const dropped = extraction.candidates.length - records.length;
    if (dropped > 0) {
        log.warning(`[Orchestrator] Normalizer dropped ${dropped} candidate(s) failing required fields.`);
    }

    const inserted = await persistFlights(deps.store, records, config.retry);

    const result: ExtractionCycleResult = {
        runId: ctx.runId,
        todayMarker: marker,
        candidates: extraction.candidates.length,
        normalized: records.length,
        inserted,
        rowsSkipped: extraction.skippedRows + dropped,
        stopReason: extraction.stopReason,
        degraded: extraction.degraded,
    };

    log.info(
        `[Orchestrator] Run ${ctx.runId} done: ${result.candidates} candidates, ` +
        `${result.normalized} normalized, ${result.inserted} new, ${result.rowsSkipped} skipped` +
        `${result.degraded ? ' (degraded: listing never became ready)' : ''}.`
    );
    return result;
}
