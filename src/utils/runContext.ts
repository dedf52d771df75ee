import * as crypto from 'crypto';
import { DateTime } from 'luxon';

export type CycleName = 'extract' | 'aggregate' | 'stats' | 'migrate';

export interface RunContext {
    runId: string;
    cycle: CycleName;
    startedAt: string;
}

export function createRunContext(cycle: CycleName): RunContext {
    return {
        runId: crypto.randomUUID(),
        cycle,
        startedAt: new Date().toISOString(),
    };
}

/** Today's date in `timeZone` as yyyyMMdd, the prefix of the listing's schedule tokens. */
export function todayMarker(timeZone: string, now: Date = new Date()): string {
    return DateTime.fromJSDate(now, { zone: timeZone }).toFormat('yyyyMMdd');
}
