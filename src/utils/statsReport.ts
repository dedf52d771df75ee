/**
 * src/utils/statsReport.ts
 *
 * Plain-text rendering of what statsReader loads, for `npm run stats`.
 */

import { DateTime } from 'luxon';
import type { DerivedStats, GlobalMetrics, RecentFlightRow } from './statsReader.js';

function day(date: Date | null, timeZone: string): string {
    return date ? DateTime.fromJSDate(date, { zone: timeZone }).toFormat('yyyy-MM-dd') : '—';
}

function stamp(date: Date | null, timeZone: string): string {
    return date ? DateTime.fromJSDate(date, { zone: timeZone }).toFormat('yyyy-MM-dd HH:mm') : '—';
}

function section(title: string): string[] {
    return ['', title, '─'.repeat(title.length)];
}

export function renderMetrics(metrics: GlobalMetrics, timeZone: string): string[] {
    return [
        ...section('Global metrics'),
        `Total flights         : ${metrics.totalFlights}`,
        `Distinct destinations : ${metrics.distinctDestinations}`,
        `Distinct airlines     : ${metrics.distinctAirlines}`,
        `Data range            : ${day(metrics.firstFlight, timeZone)} → ${day(metrics.lastFlight, timeZone)}`,
    ];
}

export function renderDerived(stats: DerivedStats): string[] {
    const lines = [...section('Top destinations')];
    if (stats.destinations.length === 0) lines.push('(not aggregated yet)');
    for (const row of stats.destinations) lines.push(`${String(row.count).padStart(5)}  ${row.destination}`);

    lines.push(...section('Busiest airlines'));
    if (stats.airlines.length === 0) lines.push('(not aggregated yet)');
    for (const row of stats.airlines) lines.push(`${String(row.count).padStart(5)}  ${row.airline}`);

    lines.push(...section('Hourly traffic'));
    if (stats.hourly.length === 0) lines.push('(not aggregated yet)');
    for (const row of stats.hourly) {
        lines.push(`${String(row.hour).padStart(2, '0')}:00  ${String(row.flightsCount).padStart(4)}  ${'█'.repeat(row.flightsCount)}`);
    }
    return lines;
}

export function renderRecent(rows: RecentFlightRow[], timeZone: string): string[] {
    const lines = [...section(`Latest ${rows.length} raw row(s)`)];
    for (const row of rows) {
        lines.push(
            [
                stamp(row.scheduled_time, timeZone),
                row.flight_number.padEnd(8),
                (row.destination ?? '—').padEnd(24),
                row.airline ?? '—',
            ].join('  ')
        );
    }
    return lines;
}
