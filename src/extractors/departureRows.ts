/**
 * src/extractors/departureRows.ts
 *
 * Parses the departures table out of rendered page HTML.
 *
 * Column positions are fixed: destination = 1, flight number = 2,
 * airline = 4. Missing trailing cells give null rather than failing the row.
 * Rows without a usable schedule token are skipped one by one.
 */

import * as cheerio from 'cheerio';
import type { ListingSite } from '../config/chopin.js';
import { RowParseSkipped } from '../errors.js';
import type { CandidateRecord } from '../types.js';

export interface RowParseOptions {
    site: ListingSite;
    airport: string;
    /** yyyyMMdd in the airport's time zone. */
    todayMarker: string;
}

export interface RowParseReport {
    candidates: CandidateRecord[];
    rowsSeen: number;
    otherDayRows: number;
    skipped: RowParseSkipped[];
}

export function parseDepartureRows(html: string, options: RowParseOptions): RowParseReport {
    const { site, airport, todayMarker } = options;
    const $ = cheerio.load(html);

    let rows = $(site.selectors.dataRow);
    if (rows.length === 0) rows = $(site.selectors.fallbackRow);

    const report: RowParseReport = { candidates: [], rowsSeen: rows.length, otherDayRows: 0, skipped: [] };

    rows.each((index, el) => {
        const $row = $(el);
        const cells = $row.find('td');

        // Header and spacer rows carry neither a token nor data cells.
        if (cells.length === 0) {
            report.rowsSeen--;
            return;
        }

        const sourceKey = $row.attr(site.sourceKeyAttribute)?.trim();
        if (!sourceKey) {
            report.skipped.push(RowParseSkipped.missingSourceKey(index));
            return;
        }
        if (sourceKey.length < 8) {
            report.skipped.push(RowParseSkipped.shortSourceKey(index, sourceKey));
            return;
        }
        if (sourceKey.slice(0, 8) !== todayMarker) {
            report.otherDayRows++;
            return;
        }
        if (cells.length <= site.columns.flightNumber) {
            report.skipped.push(RowParseSkipped.missingCells(index, cells.length));
            return;
        }

        const cellText = (position: number): string | null =>
            position < cells.length ? cells.eq(position).text().trim() : null;

        report.candidates.push({
            airport,
            flightNumber: cellText(site.columns.flightNumber),
            destination: cellText(site.columns.destination),
            airline: cellText(site.columns.airline),
            sourceKey,
        });
    });

    return report;
}
