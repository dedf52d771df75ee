/**
 * src/utils/aggregator.ts
 *
 * Aggregation cycle: read `flights_raw`, recompute the statistics, replace
 * the three derived tables.
 *
 * • Empty input (no rows, or no row with destination + airline + time)
 *   leaves the derived tables untouched.
 * • Each derived table is replaced in its own transaction
 *   (TRUNCATE + INSERT). A failure rolls back that table only and the
 *   remaining tables are still attempted.
 * • A failed read is fatal to the cycle.
 */

import { log } from 'crawlee';
import {
    BUSIEST_AIRLINES,
    HOURLY_TRAFFIC,
    RAW_TABLE,
    TOP_DESTINATIONS,
    type DerivedTableSpec,
} from '../db/schema.js';
import { storedFlightRow } from '../db/rows.js';
import { PipelineErrorCodes } from '../errors.js';
import type { FlightStatistics, StoredFlightRow } from '../types.js';
import { isUndefinedTable, parseRows, withSession, withTransaction, type Datastore } from './db.js';
import type { RetryPolicy } from './retry.js';
import { computeStatistics, usableFlights } from './statistics.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface AggregationOptions {
    retry: RetryPolicy;
    topN: number;
    timeZone: string;
}

export type TableOutcome =
    | { table: string; status: 'replaced'; rows: number }
    | { table: string; status: 'failed'; error: string };

export type AggregationOutcome =
    | {
        status: 'skipped';
        code: PipelineErrorCodes.NO_DATA_TO_AGGREGATE;
        reason: 'empty-table' | 'no-usable-rows';
        rawRows: number;
    }
    | {
        status: 'updated';
        rawRows: number;
        usableRows: number;
        statistics: FlightStatistics;
        tables: TableOutcome[];
    };

// ─── Read ─────────────────────────────────────────────────────────────────────

export async function loadRawFlights(store: Datastore, policy: RetryPolicy): Promise<StoredFlightRow[]> {
    return withSession(store, policy, 'read raw flights', async (session) => {
        try {
            const { rows } = await session.query(`SELECT destination, airline, scheduled_time FROM ${RAW_TABLE}`);
            return parseRows(storedFlightRow, rows);
        } catch (err) {
            // Nothing has been extracted yet.
            if (isUndefinedTable(err)) return [];
            throw err;
        }
    });
}

// ─── Replace ──────────────────────────────────────────────────────────────────

export function buildReplaceInsertSql(spec: DerivedTableSpec, rowCount: number): string {
    const tuples: string[] = [];
    for (let row = 0; row < rowCount; row++) {
        tuples.push(`($${row * 2 + 1}, $${row * 2 + 2})`);
    }
    return `INSERT INTO ${spec.name} (${spec.columns.join(', ')}) VALUES ${tuples.join(', ')}`;
}

/**
 * Replace the full contents of one derived table in a single transaction.
 */
export async function replaceDerivedTable(
    store: Datastore,
    policy: RetryPolicy,
    spec: DerivedTableSpec,
    rows: Array<readonly [string | number, number]>
): Promise<void> {
    await withSession(store, policy, `replace ${spec.name}`, async (session) => {
        await session.query(spec.ddl);
        await withTransaction(session, async (tx) => {
            await tx.query(`TRUNCATE ${spec.name}`);
            if (rows.length > 0) {
                await tx.query(buildReplaceInsertSql(spec, rows.length), rows.flatMap((r) => [r[0], r[1]]));
            }
        });
    });
}

function tableRows(statistics: FlightStatistics): Array<[DerivedTableSpec, Array<readonly [string | number, number]>]> {
    return [
        [TOP_DESTINATIONS, statistics.destinations.map((d) => [d.destination, d.count] as const)],
        [BUSIEST_AIRLINES, statistics.airlines.map((a) => [a.airline, a.count] as const)],
        [HOURLY_TRAFFIC, statistics.hourly.map((h) => [h.hour, h.flightsCount] as const)],
    ];
}

// ─── Cycle ────────────────────────────────────────────────────────────────────

export async function runAggregation(store: Datastore, options: AggregationOptions): Promise<AggregationOutcome> {
    const raw = await loadRawFlights(store, options.retry);
    if (raw.length === 0) {
        log.info(`[Aggregator] ${RAW_TABLE} is empty. Derived tables left unchanged.`);
        return { status: 'skipped', code: PipelineErrorCodes.NO_DATA_TO_AGGREGATE, reason: 'empty-table', rawRows: 0 };
    }

    const flights = usableFlights(raw);
    if (flights.length === 0) {
        log.info(`[Aggregator] None of ${raw.length} rows has destination, airline and time. Derived tables left unchanged.`);
        return {
            status: 'skipped',
            code: PipelineErrorCodes.NO_DATA_TO_AGGREGATE,
            reason: 'no-usable-rows',
            rawRows: raw.length,
        };
    }

    const statistics = computeStatistics(flights, { topN: options.topN, timeZone: options.timeZone });

    const tables: TableOutcome[] = [];
    for (const [spec, rows] of tableRows(statistics)) {
        try {
            await replaceDerivedTable(store, options.retry, spec, rows);
            tables.push({ table: spec.name, status: 'replaced', rows: rows.length });
            log.info(`[Aggregator] ✓ ${spec.name}: ${rows.length} rows.`);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            tables.push({ table: spec.name, status: 'failed', error: message });
            log.error(`[Aggregator] ✗ ${spec.name} not replaced (previous contents kept): ${message}`);
        }
    }

    return { status: 'updated', rawRows: raw.length, usableRows: flights.length, statistics, tables };
}
