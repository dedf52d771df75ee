/**
 * src/utils/entrypoint.ts
 *
 * Shared tail of every CLI: run `main`, close the LOG_FILE mirror whatever
 * happens, and exit 1 on an uncaught error.
 */

import { closeFileLogger } from './fileLogger.js';

export async function runEntrypoint(
    main: () => Promise<void>,
    exit: (code: number) => void = (code) => process.exit(code)
): Promise<void> {
    try {
        await main();
    } catch (err) {
        console.error('[FATAL]', err);
        closeFileLogger();
        exit(1);
        return;
    }
    closeFileLogger();
}
