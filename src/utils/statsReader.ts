/**
 * src/utils/statsReader.ts
 *
 * Read-only queries behind the dashboard. Nothing here writes.
 */

import type { z } from 'zod';
import {
    airlineCountRow,
    destinationCountRow,
    globalMetricsRow,
    hourlyCountRow,
    recentFlightRow,
} from '../db/rows.js';
import { BUSIEST_AIRLINES, HOURLY_TRAFFIC, RAW_TABLE, TOP_DESTINATIONS } from '../db/schema.js';
import type { AirlineCount, DestinationCount, HourlyCount } from '../types.js';
import { isUndefinedTable, parseRows, withSession, type Datastore, type DatastoreSession, type SqlRow } from './db.js';
import type { RetryPolicy } from './retry.js';

export const RAW_ROW_LIMITS = [100, 500, 1000, 5000] as const;
export type RawRowLimit = (typeof RAW_ROW_LIMITS)[number];
export const DEFAULT_RAW_ROW_LIMIT: RawRowLimit = 1000;

export interface GlobalMetrics {
    totalFlights: number;
    distinctDestinations: number;
    distinctAirlines: number;
    firstFlight: Date | null;
    lastFlight: Date | null;
}

export interface DerivedStats {
    destinations: DestinationCount[];
    airlines: AirlineCount[];
    hourly: HourlyCount[];
}

export type RecentFlightRow = z.infer<typeof recentFlightRow>;

/** Tables only exist after the first cycle that writes them. */
async function rowsOrEmpty(session: DatastoreSession, sql: string, values?: unknown[]): Promise<SqlRow[]> {
    try {
        const { rows } = await session.query(sql, values);
        return rows;
    } catch (err) {
        if (isUndefinedTable(err)) return [];
        throw err;
    }
}

export function isRawRowLimit(value: number): value is RawRowLimit {
    return RAW_ROW_LIMITS.some((limit) => limit === value);
}

export async function loadGlobalMetrics(store: Datastore, policy: RetryPolicy): Promise<GlobalMetrics> {
    return withSession(store, policy, 'load global metrics', async (session) => {
        const rows = await rowsOrEmpty(
            session,
            `
            SELECT
                COUNT(*)::text                      AS total_flights,
                COUNT(DISTINCT destination)::text   AS distinct_destinations,
                COUNT(DISTINCT airline)::text       AS distinct_airlines,
                MIN(scheduled_time)                 AS first_flight,
                MAX(scheduled_time)                 AS last_flight
            FROM ${RAW_TABLE}
        `
        );
        const row = parseRows(globalMetricsRow, rows)[0];
        return {
            totalFlights: row?.total_flights ?? 0,
            distinctDestinations: row?.distinct_destinations ?? 0,
            distinctAirlines: row?.distinct_airlines ?? 0,
            firstFlight: row?.first_flight ?? null,
            lastFlight: row?.last_flight ?? null,
        };
    });
}

export async function loadDerivedStats(store: Datastore, policy: RetryPolicy): Promise<DerivedStats> {
    return withSession(store, policy, 'load derived stats', async (session) => {
        const destinations = await rowsOrEmpty(
            session,
            `SELECT destination, count FROM ${TOP_DESTINATIONS.name} ORDER BY count DESC`
        );
        const airlines = await rowsOrEmpty(
            session,
            `SELECT airline, count FROM ${BUSIEST_AIRLINES.name} ORDER BY count DESC`
        );
        const hourly = await rowsOrEmpty(
            session,
            `SELECT hour, flights_count FROM ${HOURLY_TRAFFIC.name} ORDER BY hour`
        );
        return {
            destinations: parseRows(destinationCountRow, destinations),
            airlines: parseRows(airlineCountRow, airlines),
            hourly: parseRows(hourlyCountRow, hourly).map((r) => ({ hour: r.hour, flightsCount: r.flights_count })),
        };
    });
}

export async function loadRecentFlights(
    store: Datastore,
    policy: RetryPolicy,
    limit: RawRowLimit = DEFAULT_RAW_ROW_LIMIT
): Promise<RecentFlightRow[]> {
    return withSession(store, policy, 'load recent flights', async (session) => {
        const rows = await rowsOrEmpty(
            session,
            `SELECT airport, flight_number, destination, airline, scheduled_time, created_at
             FROM ${RAW_TABLE}
             ORDER BY scheduled_time DESC
             LIMIT $1`,
            [limit]
        );
        return parseRows(recentFlightRow, rows);
    });
}
