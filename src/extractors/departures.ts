/**
 * src/extractors/departures.ts
 *
 * Harvests today's departures from a listing that reveals more rows each
 * time its "more" control is clicked.
 *
 * Steps:
 *  1. Navigate. A page that never loads is fatal (ExtractionFailed).
 *  2. Wait for the table, the "more" control or the "no entries" marker.
 *     If none shows up, save the markup for diagnostics and parse whatever
 *     is visible.
 *  3. Click "more" until the row count stops changing (see convergence.ts),
 *     the control disappears, the iteration cap or the run deadline is hit.
 *     A page call failing mid-loop stops revealing; the rows already on the
 *     page are still parsed.
 *  4. Parse the final markup into candidates (see departureRows.ts).
 */

import { log as defaultLog, type Log } from 'crawlee';
import type { ListingSite } from '../config/chopin.js';
import { ExtractionFailed } from '../errors.js';
import type { CandidateRecord } from '../types.js';
import {
    INITIAL_CONVERGENCE,
    halt,
    observeRowCount,
    type ConvergedState,
    type ConvergenceState,
    type StopReason,
} from './convergence.js';
import { parseDepartureRows } from './departureRows.js';
import type { PageDriver, PageElement } from './pageDriver.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ExtractOptions {
    site: ListingSite;
    airport: string;
    /** yyyyMMdd in the airport's time zone; rows for other days are dropped. */
    todayMarker: string;
    readyTimeoutMs: number;
    settleTimeoutMs: number;
    maxIterations: number;
    /** Epoch ms after which revealing stops and partial results are returned. */
    deadline?: number;
    now?: () => number;
    log?: Log;
    /** Receives the page markup when the listing never became ready. */
    onDiagnostics?: (markup: string) => Promise<void>;
}

export interface ExtractionResult {
    candidates: CandidateRecord[];
    rowsSeen: number;
    otherDayRows: number;
    skippedRows: number;
    revealClicks: number;
    stopReason: StopReason;
    /** True when the page never became ready and only visible rows were parsed. */
    degraded: boolean;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

async function isPresent(driver: PageDriver, selector: string): Promise<boolean> {
    const elements = await driver.findElements(selector);
    return elements.length > 0;
}

async function countRows(driver: PageDriver, site: ListingSite): Promise<number> {
    const rows = await driver.findElements(site.selectors.row);
    return rows.length;
}

async function firstVisible(driver: PageDriver, selector: string): Promise<PageElement | null> {
    for (const element of await driver.findElements(selector)) {
        if (await element.isVisible().catch(() => false)) return element;
    }
    return null;
}

async function removeOverlays(driver: PageDriver, site: ListingSite, log: Log): Promise<void> {
    try {
        const removed = await driver.removeElements(site.selectors.overlays);
        if (removed > 0) log.debug(`[Extractor] Removed ${removed} overlay element(s).`);
    } catch (err) {
        log.debug(`[Extractor] Overlay removal failed: ${describe(err)}`);
    }
}

/** Click the control; on failure clear overlays and try exactly once more. */
async function triggerReveal(driver: PageDriver, control: PageElement, site: ListingSite, log: Log): Promise<boolean> {
    try {
        await driver.click(control);
        return true;
    } catch (err) {
        log.debug(`[Extractor] Reveal click failed (${describe(err)}). Clearing overlays and retrying once.`);
    }

    await removeOverlays(driver, site, log);
    try {
        await driver.click(control);
        return true;
    } catch (err) {
        log.warning(`[Extractor] Reveal click failed twice: ${describe(err)}`);
        return false;
    }
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

// ─── Reveal loop ──────────────────────────────────────────────────────────────

interface RevealOutcome {
    state: ConvergedState;
    clicks: number;
}

async function revealAll(driver: PageDriver, options: ExtractOptions, log: Log): Promise<RevealOutcome> {
    const { site } = options;
    const now = options.now ?? Date.now;
    let state: ConvergenceState = INITIAL_CONVERGENCE;
    let clicks = 0;

    for (;;) {
        if (options.deadline !== undefined && now() >= options.deadline) {
            log.warning(`[Extractor] Run budget exhausted after ${clicks} reveal click(s). Returning partial results.`);
            return { state: halt(state, 'deadline'), clicks };
        }
        if (clicks >= options.maxIterations) {
            log.warning(`[Extractor] Hit the cap of ${options.maxIterations} reveal clicks.`);
            return { state: halt(state, 'iteration-cap'), clicks };
        }

        try {
            const count = await countRows(driver, site);
            state = observeRowCount(state, count);
            if (state.phase === 'converged') return { state, clicks };

            const control = await firstVisible(driver, site.selectors.revealMore);
            if (!control) return { state: halt(state, 'no-control'), clicks };

            if (!(await triggerReveal(driver, control, site, log))) {
                return { state: halt(state, 'click-failed'), clicks };
            }
            clicks++;

            const remaining = options.deadline === undefined ? Infinity : Math.max(0, options.deadline - now());
            const grew = await driver.waitUntil(
                async () => (await countRows(driver, site)) > count,
                Math.min(options.settleTimeoutMs, remaining)
            );
            if (!grew) {
                log.debug(`[Extractor] Row count still ${count} after click ${clicks} (${state.phase}).`);
            }
        } catch (err) {
            log.warning(`[Extractor] Page interaction failed after ${clicks} click(s): ${describe(err)}. Keeping what is visible.`);
            return { state: halt(state, 'driver-error'), clicks };
        }
    }
}

// ─── Extract ──────────────────────────────────────────────────────────────────

async function parseVisible(
    driver: PageDriver,
    options: ExtractOptions,
    log: Log,
    outcome: RevealOutcome,
    degraded: boolean,
    markup?: string
): Promise<ExtractionResult> {
    let html = markup;
    if (html === undefined) {
        try {
            html = await driver.currentMarkup();
        } catch (err) {
            log.warning(`[Extractor] Could not read the page markup: ${describe(err)}`);
            return {
                candidates: [],
                rowsSeen: 0,
                otherDayRows: 0,
                skippedRows: 0,
                revealClicks: outcome.clicks,
                stopReason: outcome.state.reason,
                degraded: true,
            };
        }
    }
    const report = parseDepartureRows(html, {
        site: options.site,
        airport: options.airport,
        todayMarker: options.todayMarker,
    });

    for (const skipped of report.skipped) {
        log.debug(`[Extractor] Skipped row: ${skipped.message}`);
    }

    return {
        candidates: report.candidates,
        rowsSeen: report.rowsSeen,
        otherDayRows: report.otherDayRows,
        skippedRows: report.skipped.length,
        revealClicks: outcome.clicks,
        stopReason: outcome.state.reason,
        degraded,
    };
}

export async function extractDepartures(driver: PageDriver, options: ExtractOptions): Promise<ExtractionResult> {
    const log = options.log ?? defaultLog;
    const { site } = options;
    const now = options.now ?? Date.now;

    log.info(`[Extractor] Loading ${site.url}`);
    try {
        await driver.navigate(site.url);
    } catch (err) {
        throw ExtractionFailed.navigation(site.url, err);
    }

    await removeOverlays(driver, site, log);

    const remaining = options.deadline === undefined ? Infinity : Math.max(0, options.deadline - now());
    const ready = await driver.waitUntil(
        async () =>
            (await isPresent(driver, site.selectors.table)) ||
            (await isPresent(driver, site.selectors.revealMore)) ||
            (await isPresent(driver, site.selectors.emptyListing)),
        Math.min(options.readyTimeoutMs, remaining)
    );

    if (!ready) {
        log.warning(`[Extractor] Listing not ready after ${options.readyTimeoutMs}ms. Parsing whatever is visible.`);
        const markup = await driver.currentMarkup();
        if (options.onDiagnostics) {
            try {
                await options.onDiagnostics(markup);
            } catch (err) {
                log.warning(`[Extractor] Could not save diagnostics: ${describe(err)}`);
            }
        }
        return parseVisible(driver, options, log, { state: halt(INITIAL_CONVERGENCE, 'page-not-ready'), clicks: 0 }, true, markup);
    }

    if (await isPresent(driver, site.selectors.emptyListing)) {
        log.info('[Extractor] Listing reports no departures.');
        return {
            candidates: [],
            rowsSeen: 0,
            otherDayRows: 0,
            skippedRows: 0,
            revealClicks: 0,
            stopReason: 'empty-listing',
            degraded: false,
        };
    }

    const outcome = await revealAll(driver, options, log);
    log.info(
        `[Extractor] Reveal loop stopped (${outcome.state.reason}) after ${outcome.clicks} click(s) ` +
        `with ${outcome.state.count} rows visible.`
    );

    const result = await parseVisible(driver, options, log, outcome, false);
    log.info(
        `[Extractor] ${result.candidates.length} candidates for ${options.todayMarker} ` +
        `(${result.otherDayRows} other-day, ${result.skippedRows} skipped).`
    );
    return result;
}
