/**
 * src/db/rows.ts
 *
 * Shapes of the rows each read query selects. node-postgres returns
 * TIMESTAMPTZ as Date, INTEGER as number and COUNT(*) as text.
 */

import { z } from 'zod';

const count = z.coerce.number().int().nonnegative();

export const storedFlightRow = z.object({
    destination: z.string().nullable(),
    airline: z.string().nullable(),
    scheduled_time: z.date().nullable(),
});

export const globalMetricsRow = z.object({
    total_flights: count,
    distinct_destinations: count,
    distinct_airlines: count,
    first_flight: z.date().nullable(),
    last_flight: z.date().nullable(),
});

export const destinationCountRow = z.object({ destination: z.string(), count });
export const airlineCountRow = z.object({ airline: z.string(), count });
export const hourlyCountRow = z.object({
    hour: z.coerce.number().int().min(0).max(23),
    flights_count: count,
});

export const recentFlightRow = z.object({
    airport: z.string(),
    flight_number: z.string(),
    destination: z.string().nullable(),
    airline: z.string().nullable(),
    scheduled_time: z.date().nullable(),
    created_at: z.date().nullable(),
});
