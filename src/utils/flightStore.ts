/**
 * src/utils/flightStore.ts
 *
 * Persists normalized departures to `flights_raw`.
 *
 * Design
 * ──────
 * • INSERT … ON CONFLICT (airport, flight_number, source_key) DO NOTHING, so a
 *   re-scraped departure is silently skipped at the DB level.
 * • One transaction per batch: either every non-conflicting row lands or none
 *   does. The writer never retries the batch; the next cycle does.
 * • created_at is left to the column default.
 */

import { log } from 'crawlee';
import { CREATE_RAW_TABLE, RAW_TABLE, RAW_TABLE_INDEXES } from '../db/schema.js';
import type { RawFlightRecord } from '../types.js';
import { withSession, withTransaction, type Datastore, type DatastoreSession } from './db.js';
import type { RetryPolicy } from './retry.js';

// ─── Insert ─────────────────────────────────────────────────────────────────

const INSERT_COLUMNS = [
    'airport',
    'flight_number',
    'destination',
    'airline',
    'scheduled_time',
    'source_key',
] as const;

/** Rows per INSERT statement; keeps parameter count far below PostgreSQL's 65535 limit. */
export const INSERT_CHUNK_SIZE = 500;

export function buildInsertSql(rowCount: number): string {
    const width = INSERT_COLUMNS.length;
    const tuples: string[] = [];
    for (let row = 0; row < rowCount; row++) {
        const placeholders = INSERT_COLUMNS.map((_, col) => `$${row * width + col + 1}`);
        tuples.push(`(${placeholders.join(', ')})`);
    }
    return (
        `INSERT INTO ${RAW_TABLE} (${INSERT_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')} ` +
        'ON CONFLICT (airport, flight_number, source_key) DO NOTHING'
    );
}

function toParams(records: RawFlightRecord[]): unknown[] {
    return records.flatMap((r) => [
        r.airport,
        r.flightNumber,
        r.destination,
        r.airline,
        r.scheduledTime,
        r.sourceKey,
    ]);
}

// ─── Schema ─────────────────────────────────────────────────────────────────

/** Create `flights_raw` and its index when absent. Never destructive. */
export async function ensureRawSchema(session: DatastoreSession): Promise<void> {
    await session.query(CREATE_RAW_TABLE);
    for (const idx of RAW_TABLE_INDEXES) {
        await session.query(idx);
    }
}

// ─── Persist ────────────────────────────────────────────────────────────────

/**
 * Write a batch of departures.
 *
 * @returns Rows actually inserted; conflicts are not counted.
 */
export async function persistFlights(
    store: Datastore,
    records: RawFlightRecord[],
    policy: RetryPolicy
): Promise<number> {
    if (records.length === 0) {
        log.info('[Store] Nothing to persist.');
        return 0;
    }

    const inserted = await withSession(store, policy, 'persist flights', async (session) => {
        await ensureRawSchema(session);
        return withTransaction(session, async (tx) => {
            let total = 0;
            for (let start = 0; start < records.length; start += INSERT_CHUNK_SIZE) {
                const chunk = records.slice(start, start + INSERT_CHUNK_SIZE);
                const result = await tx.query(buildInsertSql(chunk.length), toParams(chunk));
                total += result.rowCount ?? 0;
            }
            return total;
        });
    });

    log.info(
        `[Store] Inserted ${inserted}/${records.length} departures into ${RAW_TABLE} ` +
        `(${records.length - inserted} already stored).`
    );
    return inserted;
}

