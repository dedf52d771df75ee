/**
 * src/utils/normalize.ts
 *
 * Candidate rows → storage-ready departures. Pure: no I/O, no clock.
 */

import { DateTime } from 'luxon';
import type { CandidateRecord, RawFlightRecord } from '../types.js';

/** A source key must at least carry the yyyyMMdd date. */
export const MIN_SOURCE_KEY_LENGTH = 8;

const SCHEDULE_FORMATS = [
    { pattern: /^\d{14}/, length: 14, format: 'yyyyMMddHHmmss' },
    { pattern: /^\d{12}/, length: 12, format: 'yyyyMMddHHmm' },
] as const;

export interface NormalizeOptions {
    /** IANA zone the listing's schedule tokens are written in. */
    timeZone: string;
}

function clean(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
}

/**
 * Parse the leading date-time portion of a schedule token as airport-local
 * time. Returns ISO-8601 with the zone offset, or null when unparseable.
 */
export function parseScheduledTime(sourceKey: string, timeZone: string): string | null {
    for (const { pattern, length, format } of SCHEDULE_FORMATS) {
        if (!pattern.test(sourceKey)) continue;
        const parsed = DateTime.fromFormat(sourceKey.slice(0, length), format, { zone: timeZone });
        if (!parsed.isValid) return null;
        return parsed.toISO({ suppressMilliseconds: true });
    }
    return null;
}

/**
 * Normalize one candidate, or return null when it fails a required-field check.
 */
export function normalizeCandidate(candidate: CandidateRecord, options: NormalizeOptions): RawFlightRecord | null {
    const sourceKey = clean(candidate.sourceKey);
    if (!sourceKey || sourceKey.length < MIN_SOURCE_KEY_LENGTH) return null;

    const airport = clean(candidate.airport);
    const flightNumber = clean(candidate.flightNumber);
    if (!airport || !flightNumber) return null;

    return {
        airport,
        flightNumber,
        destination: clean(candidate.destination),
        airline: clean(candidate.airline),
        scheduledTime: parseScheduledTime(sourceKey, options.timeZone),
        sourceKey,
    };
}

export function normalizeCandidates(candidates: CandidateRecord[], options: NormalizeOptions): RawFlightRecord[] {
    const records: RawFlightRecord[] = [];
    for (const candidate of candidates) {
        const record = normalizeCandidate(candidate, options);
        if (record) records.push(record);
    }
    return records;
}
