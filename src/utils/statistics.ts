/**
 * src/utils/statistics.ts
 *
 * Pure computation of the three derived statistics from raw rows.
 */

import { DateTime } from 'luxon';
import type { FlightStatistics, StoredFlightRow } from '../types.js';

export interface StatisticsOptions {
    /** Rows kept in the destination and airline rankings. */
    topN: number;
    /** Zone the hour-of-day buckets are taken in. */
    timeZone: string;
}

export interface UsableFlight {
    destination: string;
    airline: string;
    scheduledTime: Date;
}

/** Rows missing destination, airline or scheduled time cannot be aggregated. */
export function usableFlights(rows: StoredFlightRow[]): UsableFlight[] {
    const usable: UsableFlight[] = [];
    for (const row of rows) {
        if (!row.destination || !row.airline || !row.scheduled_time) continue;
        usable.push({ destination: row.destination, airline: row.airline, scheduledTime: row.scheduled_time });
    }
    return usable;
}

/**
 * Count occurrences and keep the `limit` most frequent. Ties keep the order
 * in which values were first seen (Map insertion order + stable sort).
 */
export function rankByFrequency(values: string[], limit: number): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit);
}

export function hourOf(instant: Date, timeZone: string): number {
    return DateTime.fromJSDate(instant, { zone: timeZone }).hour;
}

/** Flights per hour of day, ascending, hours without flights omitted. */
export function countByHour(flights: UsableFlight[], timeZone: string): Array<[number, number]> {
    const counts = new Map<number, number>();
    for (const flight of flights) {
        const hour = hourOf(flight.scheduledTime, timeZone);
        counts.set(hour, (counts.get(hour) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => a[0] - b[0]);
}

export function computeStatistics(flights: UsableFlight[], options: StatisticsOptions): FlightStatistics {
    return {
        destinations: rankByFrequency(flights.map((f) => f.destination), options.topN)
            .map(([destination, count]) => ({ destination, count })),
        airlines: rankByFrequency(flights.map((f) => f.airline), options.topN)
            .map(([airline, count]) => ({ airline, count })),
        hourly: countByHour(flights, options.timeZone)
            .map(([hour, flightsCount]) => ({ hour, flightsCount })),
    };
}
