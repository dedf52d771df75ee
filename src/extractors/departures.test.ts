import { describe, expect, it, vi } from 'vitest';
import { buildChopinSite } from '../config/chopin.js';
import { ExtractionFailed, PipelineErrorCodes } from '../errors.js';
import { extractDepartures, type ExtractOptions } from './departures.js';
import type { PageDriver, PageElement } from './pageDriver.js';

const site = buildChopinSite('https://listing.test/departures');

interface ListingShape {
    /** schedule tokens of every row the listing can reveal, in order */
    tokens?: string[];
    initial?: number;
    pageSize?: number;
    /** control stays on the page after the last page is revealed */
    controlPersists?: boolean;
    ready?: boolean;
    /** the table is in the markup even though the ready check never sees it */
    rowsWhileNotReady?: boolean;
    empty?: boolean;
}

function tokensFor(count: number, day = '20261019'): string[] {
    return Array.from({ length: count }, (_, i) => {
        const minutes = 6 * 60 + i * 5;
        const hh = String(Math.floor(minutes / 60)).padStart(2, '0');
        const mm = String(minutes % 60).padStart(2, '0');
        return `${day}${hh}${mm}00`;
    });
}

/** Reveal-more listing rendered on demand. */
class FakeListing implements PageDriver {
    readonly tokens: string[];
    visible: number;
    readonly pageSize: number;
    readonly controlPersists: boolean;
    readonly ready: boolean;
    readonly rowsWhileNotReady: boolean;
    readonly empty: boolean;

    clickAttempts = 0;
    overlayRemovals = 0;
    waits: number[] = [];
    failClicks = 0;
    navigationError: Error | null = null;
    /** row lookups throw once this many clicks have landed */
    breakRowLookupsAfter: number | null = null;
    markupError: Error | null = null;
    private clicksLanded = 0;

    private readonly control: PageElement = { isVisible: async () => true };

    constructor(shape: ListingShape = {}) {
        this.tokens = shape.tokens ?? tokensFor(25);
        this.pageSize = shape.pageSize ?? 10;
        this.visible = Math.min(this.tokens.length, shape.initial ?? 10);
        this.controlPersists = shape.controlPersists ?? false;
        this.ready = shape.ready ?? true;
        this.rowsWhileNotReady = shape.rowsWhileNotReady ?? false;
        this.empty = shape.empty ?? false;
    }

    async navigate(): Promise<void> {
        if (this.navigationError) throw this.navigationError;
    }

    async waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean> {
        this.waits.push(timeoutMs);
        return predicate();
    }

    async findElements(selector: string): Promise<PageElement[]> {
        if (!this.ready) return [];
        if (selector === site.selectors.emptyListing) return this.empty ? [{ isVisible: async () => true }] : [];
        if (this.empty) return [];
        if (selector === site.selectors.table) return [{ isVisible: async () => true }];
        if (selector === site.selectors.row) {
            if (this.breakRowLookupsAfter !== null && this.clicksLanded >= this.breakRowLookupsAfter) {
                throw new Error('Execution context was destroyed, most likely because of a navigation');
            }
            return Array.from({ length: this.visible }, () => ({ isVisible: async () => true }));
        }
        if (selector === site.selectors.revealMore) {
            const more = this.visible < this.tokens.length;
            return more || this.controlPersists ? [this.control] : [];
        }
        return [];
    }

    async click(element: PageElement): Promise<void> {
        expect(element).toBe(this.control);
        this.clickAttempts++;
        if (this.failClicks > 0) {
            this.failClicks--;
            throw new Error('Element is covered by another element');
        }
        this.visible = Math.min(this.tokens.length, this.visible + this.pageSize);
        this.clicksLanded++;
    }

    async currentMarkup(): Promise<string> {
        if (this.markupError) throw this.markupError;
        if (!this.ready && !this.rowsWhileNotReady) return '<html><body><div class="spinner"></div></body></html>';
        const rows = this.tokens
            .slice(0, this.visible)
            .map(
                (token, i) =>
                    `<tr class="tooltip" data-timesch="${token}"><td>${token.slice(8, 10)}:${token.slice(10, 12)}</td>` +
                    `<td>City ${i}</td><td>XX ${100 + i}</td><td></td><td>Airline ${i % 3}</td></tr>`
            )
            .join('');
        return `<html><body><table class="flightboard departures">${rows}</table></body></html>`;
    }

    async removeElements(): Promise<number> {
        this.overlayRemovals++;
        return 0;
    }
}

function options(overrides: Partial<ExtractOptions> = {}): ExtractOptions {
    return {
        site,
        airport: 'chopin',
        todayMarker: '20261019',
        readyTimeoutMs: 30_000,
        settleTimeoutMs: 8_000,
        maxIterations: 200,
        ...overrides,
    };
}

describe('extractDepartures', () => {
    it('stops two clicks after the listing stops growing', async () => {
        // 10 → 20 → 25 takes k = 2 growing clicks
        const listing = new FakeListing({ controlPersists: true });

        const result = await extractDepartures(listing, options());

        expect(result.revealClicks).toBe(4);
        expect(result.stopReason).toBe('stable');
        expect(result.candidates).toHaveLength(25);
        expect(result.degraded).toBe(false);
    });

    it('stops as soon as the reveal control disappears', async () => {
        const listing = new FakeListing();

        const result = await extractDepartures(listing, options());

        expect(result.revealClicks).toBe(2);
        expect(result.stopReason).toBe('no-control');
        expect(result.candidates).toHaveLength(25);
    });

    it('does not click when everything is already visible', async () => {
        const listing = new FakeListing({ tokens: tokensFor(4) });

        const result = await extractDepartures(listing, options());

        expect(result.revealClicks).toBe(0);
        expect(result.stopReason).toBe('no-control');
        expect(result.candidates.map((c) => c.flightNumber)).toEqual(['XX 100', 'XX 101', 'XX 102', 'XX 103']);
    });

    it('keeps only rows scheduled for today', async () => {
        const listing = new FakeListing({ tokens: [...tokensFor(3), ...tokensFor(2, '20261020')] });

        const result = await extractDepartures(listing, options());

        expect(result.candidates.map((c) => c.sourceKey)).toEqual(['20261019060000', '20261019060500', '20261019061000']);
        expect(result.otherDayRows).toBe(2);
    });

    it('returns nothing for a listing that reports no departures', async () => {
        const listing = new FakeListing({ empty: true });

        const result = await extractDepartures(listing, options());

        expect(result).toEqual({
            candidates: [],
            rowsSeen: 0,
            otherDayRows: 0,
            skippedRows: 0,
            revealClicks: 0,
            stopReason: 'empty-listing',
            degraded: false,
        });
        expect(listing.clickAttempts).toBe(0);
    });

    it('saves diagnostics and degrades when the listing never becomes ready', async () => {
        const listing = new FakeListing({ ready: false });
        const onDiagnostics = vi.fn(async (_markup: string) => {});

        const result = await extractDepartures(listing, options({ onDiagnostics }));

        expect(onDiagnostics).toHaveBeenCalledWith('<html><body><div class="spinner"></div></body></html>');
        expect(result.degraded).toBe(true);
        expect(result.stopReason).toBe('page-not-ready');
        expect(result.candidates).toEqual([]);
    });

    it('still returns a degraded result when diagnostics cannot be written', async () => {
        const listing = new FakeListing({ ready: false });
        const onDiagnostics = vi.fn(async () => {
            throw new Error('EACCES');
        });

        const result = await extractDepartures(listing, options({ onDiagnostics }));

        expect(result.degraded).toBe(true);
    });

    it('parses the rows that are visible when the listing never becomes ready', async () => {
        const listing = new FakeListing({ ready: false, rowsWhileNotReady: true, tokens: tokensFor(3) });

        const result = await extractDepartures(listing, options());

        expect(result.degraded).toBe(true);
        expect(result.stopReason).toBe('page-not-ready');
        expect(result.rowsSeen).toBe(3);
        expect(result.candidates.map((c) => c.sourceKey)).toEqual(['20261019060000', '20261019060500', '20261019061000']);
    });

    it('keeps the revealed rows when the page breaks mid-loop', async () => {
        const listing = new FakeListing();
        listing.breakRowLookupsAfter = 1;

        const result = await extractDepartures(listing, options());

        expect(result.stopReason).toBe('driver-error');
        expect(result.revealClicks).toBe(1);
        expect(result.candidates).toHaveLength(20);
        expect(result.degraded).toBe(false);
    });

    it('returns an empty degraded result when the markup cannot be read either', async () => {
        const listing = new FakeListing();
        listing.breakRowLookupsAfter = 1;
        listing.markupError = new Error('Target page, context or browser has been closed');

        const result = await extractDepartures(listing, options());

        expect(result).toEqual({
            candidates: [],
            rowsSeen: 0,
            otherDayRows: 0,
            skippedRows: 0,
            revealClicks: 1,
            stopReason: 'driver-error',
            degraded: true,
        });
    });

    it('fails the run when the page cannot be loaded', async () => {
        const listing = new FakeListing();
        listing.navigationError = new Error('net::ERR_NAME_NOT_RESOLVED');

        const run = extractDepartures(listing, options());

        await expect(run).rejects.toBeInstanceOf(ExtractionFailed);
        await expect(run).rejects.toMatchObject({
            code: PipelineErrorCodes.EXTRACTION_FAILED,
            message: 'Failed to load listing https://listing.test/departures: net::ERR_NAME_NOT_RESOLVED',
        });
    });

    it('clears overlays and retries a blocked click once', async () => {
        const listing = new FakeListing();
        listing.failClicks = 1;

        const result = await extractDepartures(listing, options());

        expect(result.revealClicks).toBe(2);
        expect(listing.clickAttempts).toBe(3);
        // once after navigation, once after the blocked click
        expect(listing.overlayRemovals).toBe(2);
        expect(result.candidates).toHaveLength(25);
    });

    it('stops with what is visible when a click fails twice', async () => {
        const listing = new FakeListing();
        listing.failClicks = 2;

        const result = await extractDepartures(listing, options());

        expect(result.stopReason).toBe('click-failed');
        expect(result.revealClicks).toBe(0);
        expect(result.candidates).toHaveLength(10);
    });

    it('returns partial results once the run budget is spent', async () => {
        const listing = new FakeListing();

        const result = await extractDepartures(listing, options({ deadline: 1_000, now: () => 1_000 }));

        expect(result.stopReason).toBe('deadline');
        expect(result.revealClicks).toBe(0);
        expect(result.candidates).toHaveLength(10);
        expect(listing.waits).toEqual([0]);
    });

    it('caps the number of reveal clicks', async () => {
        const listing = new FakeListing();

        const result = await extractDepartures(listing, options({ maxIterations: 1 }));

        expect(result.stopReason).toBe('iteration-cap');
        expect(result.revealClicks).toBe(1);
        expect(result.candidates).toHaveLength(20);
    });

    it('bounds each settle wait by the settle timeout', async () => {
        const listing = new FakeListing();

        await extractDepartures(listing, options({ settleTimeoutMs: 1_500 }));

        expect(listing.waits).toEqual([30_000, 1_500, 1_500]);
    });
});
