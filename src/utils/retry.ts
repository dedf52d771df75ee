/**
 * src/utils/retry.ts
 *
 * Bounded retry with exponential backoff for datastore connection work.
 * Shared by the store writer, the aggregator and the stats reader.
 *
 * Backoff formula (attempt index starts at 0):
 *   delay = baseDelayMs × 2^attempt
 *
 * Only transient connection failures are retried. Anything else (bad SQL,
 * constraint violations, auth errors) propagates on the first attempt.
 */

import { setTimeout as sleepMs } from 'node:timers/promises';
import { log } from 'crawlee';
import { StoreUnavailable } from '../errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
    /** Total attempts, including the first. */
    maxAttempts: number;
    baseDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
    /** Label used in logs and in the StoreUnavailable message. */
    operation: string;
    isTransient?: (err: unknown) => boolean;
    sleep?: (ms: number) => Promise<void>;
}

// ─── Transient Failure Detection ─────────────────────────────────────────────

const TRANSIENT_SOCKET_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'EPIPE',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
]);

const TRANSIENT_SQLSTATES = new Set([
    '53300', // too_many_connections
    '57P01', // admin_shutdown
    '57P02', // crash_shutdown
    '57P03', // cannot_connect_now
]);

const TRANSIENT_MESSAGES = [
    'connection terminated',
    'timeout exceeded when trying to connect',
    'connection timeout',
    'client has encountered a connection error',
];

function errorCode(err: unknown): string | null {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return null;
}

/**
 * True for failures worth another connection attempt: socket errors,
 * SQLSTATE class 08 and the server-side "try again later" states.
 */
export function isTransientConnectionError(err: unknown): boolean {
    if (err instanceof StoreUnavailable) return false;

    const code = errorCode(err);
    if (code) {
        if (TRANSIENT_SOCKET_CODES.has(code) || TRANSIENT_SQLSTATES.has(code)) return true;
        if (code.startsWith('08')) return true;
    }

    const message = err instanceof Error ? err.message.toLowerCase() : '';
    return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment));
}

// ─── Retry Loop ───────────────────────────────────────────────────────────────

export function backoffDelayMs(baseDelayMs: number, attempt: number): number {
    return baseDelayMs * 2 ** attempt;
}

/**
 * Runs `operation` up to `maxAttempts` times. Sleeps `baseDelayMs × 2^attempt`
 * between attempts and throws StoreUnavailable once the budget is spent.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const isTransient = options.isTransient ?? isTransientConnectionError;
    const sleep = options.sleep ?? ((ms: number) => sleepMs(ms));
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (err) {
            if (!isTransient(err)) throw err;

            const attemptsMade = attempt + 1;
            if (attemptsMade >= maxAttempts) {
                log.error(`[Retry] ${options.operation}: giving up after ${attemptsMade} attempt(s).`);
                throw StoreUnavailable.retriesExhausted(options.operation, attemptsMade, err);
            }

            const delay = backoffDelayMs(options.baseDelayMs, attempt);
            const reason = err instanceof Error ? err.message : String(err);
            log.warning(
                `[Retry] ${options.operation} failed (attempt ${attemptsMade}/${maxAttempts}): ${reason}. ` +
                `Retrying in ${delay}ms.`
            );
            await sleep(delay);
        }
    }
}
