import { describe, expect, it } from 'vitest';
import { BUSIEST_AIRLINES, HOURLY_TRAFFIC, RAW_TABLE, TOP_DESTINATIONS } from '../db/schema.js';
import { PipelineErrorCodes } from '../errors.js';
import { FakeDatastore, FakeSqlError } from '../testing/fakeDatastore.js';
import { buildReplaceInsertSql, runAggregation, type AggregationOptions } from './aggregator.js';

const options: AggregationOptions = {
    retry: { maxAttempts: 2, baseDelayMs: 0 },
    topN: 10,
    timeZone: 'Europe/Warsaw',
};

function raw(destination: string | null, airline: string | null, at: string | null) {
    return {
        airport: 'chopin',
        flight_number: 'LO 1',
        destination,
        airline,
        scheduled_time: at === null ? null : new Date(at),
        source_key: '20261019000000',
    };
}

function seedPreviousStats(store: FakeDatastore): void {
    store.seed(TOP_DESTINATIONS.name, [{ destination: 'Old Town', count: 99 }]);
    store.seed(BUSIEST_AIRLINES.name, [{ airline: 'Old Air', count: 99 }]);
    store.seed(HOURLY_TRAFFIC.name, [{ hour: 3, flights_count: 99 }]);
}

describe('buildReplaceInsertSql', () => {
    it('inserts two columns per row', () => {
        expect(buildReplaceInsertSql(HOURLY_TRAFFIC, 2)).toBe(
            'INSERT INTO stats_hourly_traffic (hour, flights_count) VALUES ($1, $2), ($3, $4)'
        );
    });
});

describe('runAggregation', () => {
    it('replaces all three derived tables', async () => {
        const store = new FakeDatastore();
        seedPreviousStats(store);
        store.seed(RAW_TABLE, [
            raw('destX', 'A', '2026-10-19T08:15:00+02:00'),
            raw('destX', 'A', '2026-10-19T08:45:00+02:00'),
            raw('destY', 'B', '2026-10-19T09:30:00+02:00'),
        ]);

        const outcome = await runAggregation(store, options);

        expect(outcome).toMatchObject({ status: 'updated', rawRows: 3, usableRows: 3 });
        expect(store.rows(TOP_DESTINATIONS.name)).toEqual([
            { destination: 'destX', count: 2 },
            { destination: 'destY', count: 1 },
        ]);
        expect(store.rows(BUSIEST_AIRLINES.name)).toEqual([
            { airline: 'A', count: 2 },
            { airline: 'B', count: 1 },
        ]);
        expect(store.rows(HOURLY_TRAFFIC.name)).toEqual([
            { hour: 8, flights_count: 2 },
            { hour: 9, flights_count: 1 },
        ]);
    });

    it('creates the derived tables when they do not exist yet', async () => {
        const store = new FakeDatastore();
        store.seed(RAW_TABLE, [raw('Lisbon', 'TAP', '2026-10-19T12:00:00+02:00')]);

        await runAggregation(store, options);

        expect(store.rows(TOP_DESTINATIONS.name)).toEqual([{ destination: 'Lisbon', count: 1 }]);
        expect(store.rows(HOURLY_TRAFFIC.name)).toEqual([{ hour: 12, flights_count: 1 }]);
    });

    it('leaves derived tables untouched when the raw table is empty', async () => {
        const store = new FakeDatastore();
        seedPreviousStats(store);
        store.seed(RAW_TABLE, []);

        const outcome = await runAggregation(store, options);

        expect(outcome).toEqual({
            status: 'skipped',
            code: PipelineErrorCodes.NO_DATA_TO_AGGREGATE,
            reason: 'empty-table',
            rawRows: 0,
        });
        expect(store.rows(TOP_DESTINATIONS.name)).toEqual([{ destination: 'Old Town', count: 99 }]);
        expect(store.statements.filter((s) => s.startsWith('TRUNCATE'))).toEqual([]);
    });

    it('treats a raw table that was never created as empty', async () => {
        const store = new FakeDatastore();

        const outcome = await runAggregation(store, options);

        expect(outcome).toMatchObject({ status: 'skipped', reason: 'empty-table' });
    });

    it('skips when no row has destination, airline and time', async () => {
        const store = new FakeDatastore();
        seedPreviousStats(store);
        store.seed(RAW_TABLE, [raw(null, 'A', '2026-10-19T08:00:00+02:00'), raw('Oslo', 'SAS', null)]);

        const outcome = await runAggregation(store, options);

        expect(outcome).toEqual({
            status: 'skipped',
            code: PipelineErrorCodes.NO_DATA_TO_AGGREGATE,
            reason: 'no-usable-rows',
            rawRows: 2,
        });
        expect(store.rows(HOURLY_TRAFFIC.name)).toEqual([{ hour: 3, flights_count: 99 }]);
    });

    it('keeps a table whose replacement fails and still replaces the others', async () => {
        const store = new FakeDatastore();
        seedPreviousStats(store);
        store.seed(RAW_TABLE, [raw('Rome', 'ITA', '2026-10-19T14:00:00+02:00')]);
        store.failQuery(/^INSERT INTO stats_busiest_airlines/, new FakeSqlError('could not extend file', '53100'));

        const outcome = await runAggregation(store, options);

        expect(outcome.status === 'updated' && outcome.tables).toEqual([
            { table: 'stats_top_destinations', status: 'replaced', rows: 1 },
            { table: 'stats_busiest_airlines', status: 'failed', error: 'could not extend file' },
            { table: 'stats_hourly_traffic', status: 'replaced', rows: 1 },
        ]);
        expect(store.rows(BUSIEST_AIRLINES.name)).toEqual([{ airline: 'Old Air', count: 99 }]);
        expect(store.rows(TOP_DESTINATIONS.name)).toEqual([{ destination: 'Rome', count: 1 }]);
        expect(store.rows(HOURLY_TRAFFIC.name)).toEqual([{ hour: 14, flights_count: 1 }]);
    });

    it('ranks only the top N destinations and airlines', async () => {
        const store = new FakeDatastore();
        store.seed(RAW_TABLE, [
            raw('Kyiv', 'LOT', '2026-10-19T06:00:00+02:00'),
            raw('Kyiv', 'Wizz', '2026-10-19T07:00:00+02:00'),
            raw('Split', 'LOT', '2026-10-19T08:00:00+02:00'),
        ]);

        await runAggregation(store, { ...options, topN: 1 });

        expect(store.rows(TOP_DESTINATIONS.name)).toEqual([{ destination: 'Kyiv', count: 2 }]);
        expect(store.rows(BUSIEST_AIRLINES.name)).toEqual([{ airline: 'LOT', count: 2 }]);
        expect(store.rows(HOURLY_TRAFFIC.name)).toHaveLength(3);
    });
});
