import { beforeEach, describe, expect, it, vi } from 'vitest';
import { runEntrypoint } from './entrypoint.js';
import { closeFileLogger } from './fileLogger.js';

vi.mock('./fileLogger.js', () => ({
    closeFileLogger: vi.fn(),
    initFileLogger: vi.fn(),
}));

describe('runEntrypoint', () => {
    beforeEach(() => {
        vi.mocked(closeFileLogger).mockClear();
    });

    it('closes the log file after a clean run', async () => {
        const exit = vi.fn();
        const main = vi.fn(async () => {});

        await runEntrypoint(main, exit);

        expect(main).toHaveBeenCalledTimes(1);
        expect(closeFileLogger).toHaveBeenCalledTimes(1);
        expect(exit).not.toHaveBeenCalled();
    });

    it('reports the error, closes the log file and exits 1 on failure', async () => {
        const exit = vi.fn();
        const failure = new Error('relation "stats_hourly_traffic" is locked');
        const printed = vi.spyOn(console, 'error').mockImplementation(() => {});

        await runEntrypoint(async () => {
            throw failure;
        }, exit);

        expect(printed).toHaveBeenCalledWith('[FATAL]', failure);
        expect(closeFileLogger).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledWith(1);
    });
});
