import { describe, expect, it } from 'vitest';
import type { StoredFlightRow } from '../types.js';
import { computeStatistics, countByHour, hourOf, rankByFrequency, usableFlights } from './statistics.js';

const WARSAW = 'Europe/Warsaw';

function row(destination: string | null, airline: string | null, at: string | null): StoredFlightRow {
    return { destination, airline, scheduled_time: at === null ? null : new Date(at) };
}

describe('usableFlights', () => {
    it('drops rows missing destination, airline or time', () => {
        const rows = [
            row('Oslo', 'SAS', '2026-10-19T08:00:00+02:00'),
            row(null, 'SAS', '2026-10-19T09:00:00+02:00'),
            row('Oslo', '', '2026-10-19T10:00:00+02:00'),
            row('Oslo', 'SAS', null),
        ];

        expect(usableFlights(rows)).toEqual([
            { destination: 'Oslo', airline: 'SAS', scheduledTime: new Date('2026-10-19T06:00:00Z') },
        ]);
    });
});

describe('rankByFrequency', () => {
    it('orders by descending count', () => {
        expect(rankByFrequency(['a', 'b', 'b', 'c', 'b', 'c'], 10)).toEqual([['b', 3], ['c', 2], ['a', 1]]);
    });

    it('breaks ties by first appearance and truncates', () => {
        expect(rankByFrequency(['b', 'a', 'a', 'b', 'c'], 2)).toEqual([['b', 2], ['a', 2]]);
    });
});

describe('hourOf', () => {
    it('buckets by airport-local hour', () => {
        expect(hourOf(new Date('2026-10-19T23:30:00Z'), WARSAW)).toBe(1);
        expect(hourOf(new Date('2026-01-15T23:30:00Z'), WARSAW)).toBe(0);
    });
});

describe('countByHour', () => {
    it('lists only hours with flights, ascending', () => {
        const flights = usableFlights([
            row('A', 'X', '2026-10-19T17:10:00+02:00'),
            row('A', 'X', '2026-10-19T06:50:00+02:00'),
            row('A', 'X', '2026-10-19T17:55:00+02:00'),
        ]);

        expect(countByHour(flights, WARSAW)).toEqual([[6, 1], [17, 2]]);
    });
});

describe('computeStatistics', () => {
    it('derives all three tables from the same flights', () => {
        const flights = usableFlights([
            row('destX', 'A', '2026-10-19T08:15:00+02:00'),
            row('destX', 'A', '2026-10-19T08:45:00+02:00'),
            row('destY', 'B', '2026-10-19T09:30:00+02:00'),
        ]);

        expect(computeStatistics(flights, { topN: 10, timeZone: WARSAW })).toEqual({
            destinations: [{ destination: 'destX', count: 2 }, { destination: 'destY', count: 1 }],
            airlines: [{ airline: 'A', count: 2 }, { airline: 'B', count: 1 }],
            hourly: [{ hour: 8, flightsCount: 2 }, { hour: 9, flightsCount: 1 }],
        });
    });

    it('limits the rankings but not the hourly histogram', () => {
        const flights = usableFlights([
            row('P', 'L1', '2026-10-19T05:00:00+02:00'),
            row('Q', 'L2', '2026-10-19T06:00:00+02:00'),
            row('R', 'L3', '2026-10-19T07:00:00+02:00'),
        ]);

        const stats = computeStatistics(flights, { topN: 1, timeZone: WARSAW });

        expect(stats.destinations).toEqual([{ destination: 'P', count: 1 }]);
        expect(stats.airlines).toEqual([{ airline: 'L1', count: 1 }]);
        expect(stats.hourly).toHaveLength(3);
    });
});
