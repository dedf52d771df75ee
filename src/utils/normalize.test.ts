import { describe, expect, it } from 'vitest';
import type { CandidateRecord } from '../types.js';
import { normalizeCandidate, normalizeCandidates, parseScheduledTime } from './normalize.js';

const WARSAW = { timeZone: 'Europe/Warsaw' };

function candidate(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
    return {
        airport: 'chopin',
        flightNumber: 'LO 381',
        destination: 'Copenhagen',
        airline: 'LOT',
        sourceKey: '20261019083500',
        ...overrides,
    };
}

describe('parseScheduledTime', () => {
    it('reads a 14-digit token as airport-local summer time', () => {
        expect(parseScheduledTime('20261019083500', 'Europe/Warsaw')).toBe('2026-10-19T08:35:00+02:00');
    });

    it('applies the winter offset in January', () => {
        expect(parseScheduledTime('20260115091000', 'Europe/Warsaw')).toBe('2026-01-15T09:10:00+01:00');
    });

    it('accepts a token without seconds', () => {
        expect(parseScheduledTime('202610191745', 'Europe/Warsaw')).toBe('2026-10-19T17:45:00+02:00');
    });

    it('ignores anything after the date-time digits', () => {
        expect(parseScheduledTime('20261019083500-LO381', 'Europe/Warsaw')).toBe('2026-10-19T08:35:00+02:00');
    });

    it('returns null for a token with only a date', () => {
        expect(parseScheduledTime('20261019', 'Europe/Warsaw')).toBeNull();
    });

    it('returns null for an impossible date', () => {
        expect(parseScheduledTime('20261319083500', 'Europe/Warsaw')).toBeNull();
    });
});

describe('normalizeCandidate', () => {
    it('trims fields and attaches the scheduled time', () => {
        const record = normalizeCandidate(
            candidate({ flightNumber: '  LO 381 ', destination: ' Copenhagen\n', airline: '\tLOT ' }),
            WARSAW
        );

        expect(record).toEqual({
            airport: 'chopin',
            flightNumber: 'LO 381',
            destination: 'Copenhagen',
            airline: 'LOT',
            scheduledTime: '2026-10-19T08:35:00+02:00',
            sourceKey: '20261019083500',
        });
    });

    it('turns blank optional fields into null', () => {
        const record = normalizeCandidate(candidate({ destination: '   ', airline: '' }), WARSAW);

        expect(record?.destination).toBeNull();
        expect(record?.airline).toBeNull();
    });

    it('keeps a row whose token carries no time', () => {
        const record = normalizeCandidate(candidate({ sourceKey: '20261019XYZ' }), WARSAW);

        expect(record?.scheduledTime).toBeNull();
        expect(record?.sourceKey).toBe('20261019XYZ');
    });

    it.each<[string, Partial<CandidateRecord>]>([
        ['missing source key', { sourceKey: null }],
        ['short source key', { sourceKey: '2026101' }],
        ['blank flight number', { flightNumber: '  ' }],
        ['missing airport', { airport: null }],
    ])('drops a row with a %s', (_label, overrides) => {
        expect(normalizeCandidate(candidate(overrides), WARSAW)).toBeNull();
    });
});

describe('normalizeCandidates', () => {
    it('drops malformed rows and keeps the rest in order', () => {
        const candidates = Array.from({ length: 10 }, (_, i) =>
            candidate({ flightNumber: `LO ${i}`, sourceKey: `202610190${i}0000` })
        );
        candidates[3] = candidate({ sourceKey: null });
        candidates[7] = candidate({ sourceKey: '2026' });

        const records = normalizeCandidates(candidates, WARSAW);

        expect(records.map((r) => r.flightNumber)).toEqual(['LO 0', 'LO 1', 'LO 2', 'LO 4', 'LO 5', 'LO 6', 'LO 8', 'LO 9']);
        expect(records[1]?.scheduledTime).toBe('2026-10-19T01:00:00+02:00');
    });
});
