/**
 * src/db/schema.ts
 *
 * DDL for the raw log and the three derived tables. Every statement is
 * CREATE … IF NOT EXISTS, safe to run on every cycle.
 *
 * scheduled_time is written as airport-local time with an explicit offset
 * (e.g. 2026-10-19T08:35:00+02:00). TIMESTAMPTZ stores the instant; hour
 * buckets are recomputed in the airport time zone when aggregating.
 */

export const RAW_TABLE = 'flights_raw';

export const CREATE_RAW_TABLE = `
CREATE TABLE IF NOT EXISTS ${RAW_TABLE} (
    airport         TEXT        NOT NULL,
    flight_number   TEXT        NOT NULL,
    destination     TEXT,
    airline         TEXT,
    scheduled_time  TIMESTAMPTZ,
    source_key      TEXT        NOT NULL,
    created_at      TIMESTAMPTZ DEFAULT now(),
    PRIMARY KEY (airport, flight_number, source_key)
);
`;

export const RAW_TABLE_INDEXES = [
    `CREATE INDEX IF NOT EXISTS idx_${RAW_TABLE}_scheduled_time ON ${RAW_TABLE}(scheduled_time DESC);`,
];

// ─── Derived tables ──────────────────────────────────────────────────────────

export interface DerivedTableSpec {
    name: string;
    /** Column names in insert order. */
    columns: readonly [string, string];
    ddl: string;
}

export const TOP_DESTINATIONS: DerivedTableSpec = {
    name: 'stats_top_destinations',
    columns: ['destination', 'count'],
    ddl: 'CREATE TABLE IF NOT EXISTS stats_top_destinations (destination TEXT, count INTEGER);',
};

export const BUSIEST_AIRLINES: DerivedTableSpec = {
    name: 'stats_busiest_airlines',
    columns: ['airline', 'count'],
    ddl: 'CREATE TABLE IF NOT EXISTS stats_busiest_airlines (airline TEXT, count INTEGER);',
};

export const HOURLY_TRAFFIC: DerivedTableSpec = {
    name: 'stats_hourly_traffic',
    columns: ['hour', 'flights_count'],
    ddl: 'CREATE TABLE IF NOT EXISTS stats_hourly_traffic (hour INTEGER, flights_count INTEGER);',
};

export const DERIVED_TABLES = [TOP_DESTINATIONS, BUSIEST_AIRLINES, HOURLY_TRAFFIC] as const;

/** Everything `npm run db:migrate` applies, in order. */
export const MIGRATIONS: readonly string[] = [
    CREATE_RAW_TABLE,
    ...RAW_TABLE_INDEXES,
    ...DERIVED_TABLES.map((table) => table.ddl),
];
