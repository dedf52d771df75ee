import { log, LogLevel } from 'crawlee';
import type { Env } from '../config/envSchema.js';
import { initFileLogger } from './fileLogger.js';

const LEVELS: Record<Env['CRAWLEE_LOG_LEVEL'], LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARNING: LogLevel.WARNING,
    ERROR: LogLevel.ERROR,
    OFF: LogLevel.OFF,
};

/**
 * Apply CRAWLEE_LOG_LEVEL (`--verbose` / `-v` force DEBUG) and start the
 * optional LOG_FILE mirror. Call once at the top of an entry point.
 */
export function configureLogging(env: Env, argv: string[] = process.argv): void {
    if (env.LOG_FILE) initFileLogger(env.LOG_FILE);

    const verbose = argv.includes('--verbose') || argv.includes('-v');
    log.setLevel(verbose ? LogLevel.DEBUG : LEVELS[env.CRAWLEE_LOG_LEVEL]);
}
