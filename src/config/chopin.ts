/**
 * src/config/chopin.ts — selectors and column layout for the Warsaw Chopin
 * departures board.
 */

export interface ListingSelectors {
    /** Rows counted while revealing more entries. */
    row: string;
    /** Rows parsed into candidates; `fallbackRow` is used when none match. */
    dataRow: string;
    fallbackRow: string;
    table: string;
    revealMore: string;
    emptyListing: string;
    overlays: string;
}

export interface ListingColumns {
    destination: number;
    flightNumber: number;
    airline: number;
}

export interface ListingSite {
    url: string;
    selectors: ListingSelectors;
    columns: ListingColumns;
    /** Row attribute holding the provider's schedule token. */
    sourceKeyAttribute: string;
}

export const ChopinSelectors: ListingSelectors = {
    row: 'table.flightboard.departures tr',
    dataRow: 'table.flightboard.departures tr.tooltip',
    fallbackRow: 'table.flightboard.departures tr',
    table: 'table.flightboard.departures',
    revealMore: '.departures_more, .flightboard-more, .more',
    emptyListing: '.flightboard-empty, .flightboard .no-results, .departures_empty',
    overlays: '.cookie, .cookie-consent, .consent, .overlay, .modal, .cc-window',
};

export const ChopinColumns: ListingColumns = {
    destination: 1,
    flightNumber: 2,
    airline: 4,
};

export function buildChopinSite(url: string): ListingSite {
    return {
        url,
        selectors: ChopinSelectors,
        columns: ChopinColumns,
        sourceKeyAttribute: 'data-timesch',
    };
}
