/**
 * src/utils/scheduler.ts
 *
 * Fixed-interval loop for a pipeline cycle. Cycles never overlap: the next
 * one starts `intervalMs` after the previous one finished. A failed cycle is
 * logged and the loop carries on; aborting the signal ends the loop after
 * the current cycle.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { log } from 'crawlee';

export interface PeriodicOptions {
    name: string;
    intervalMs: number;
    signal: AbortSignal;
}

export async function runPeriodically(task: () => Promise<void>, options: PeriodicOptions): Promise<number> {
    const { name, intervalMs, signal } = options;
    let cycles = 0;

    log.info(`[Scheduler] ${name}: every ${Math.round(intervalMs / 1000)}s.`);

    while (!signal.aborted) {
        cycles++;
        try {
            await task();
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            log.error(`[Scheduler] ${name} cycle ${cycles} failed: ${reason}`);
        }

        if (signal.aborted) break;
        try {
            await sleep(intervalMs, undefined, { signal });
        } catch (err) {
            if (signal.aborted) break;
            throw err;
        }
    }

    log.info(`[Scheduler] ${name}: stopped after ${cycles} cycle(s).`);
    return cycles;
}

/**
 * AbortController wired to SIGINT / SIGTERM. A second signal exits at once.
 */
export function shutdownSignal(): AbortController {
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
        if (controller.signal.aborted) {
            log.warning(`[Main] Received ${signal} again. Exiting now.`);
            process.exit(130);
        }
        log.info(`[Main] 🛑 Received ${signal}. Finishing the current cycle, then shutting down…`);
        controller.abort();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    return controller;
}
