/**
 * src/types.ts
 *
 * Records flowing through the extraction cycle and the aggregation cycle.
 */

// ─── Extraction ───────────────────────────────────────────────────────────────

/** A listing row before normalization. Any field may be missing. */
export interface CandidateRecord {
    airport: string | null;
    flightNumber: string | null;
    destination: string | null;
    airline: string | null;
    sourceKey: string | null;
}

/** One row of `flights_raw`, minus the store-assigned `created_at`. */
export interface RawFlightRecord {
    airport: string;
    flightNumber: string;
    destination: string | null;
    airline: string | null;
    /** ISO-8601 with the airport-local offset, e.g. 2026-10-19T08:35:00+02:00 */
    scheduledTime: string | null;
    sourceKey: string;
}

// ─── Aggregation ──────────────────────────────────────────────────────────────

/** The columns of `flights_raw` the aggregator reads. */
export interface StoredFlightRow {
    destination: string | null;
    airline: string | null;
    scheduled_time: Date | null;
}

export interface DestinationCount {
    destination: string;
    count: number;
}

export interface AirlineCount {
    airline: string;
    count: number;
}

export interface HourlyCount {
    hour: number;
    flightsCount: number;
}

export interface FlightStatistics {
    destinations: DestinationCount[];
    airlines: AirlineCount[];
    hourly: HourlyCount[];
}
