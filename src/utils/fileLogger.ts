/**
 * src/utils/fileLogger.ts
 *
 * Mirrors everything written to stdout/stderr into a log file, next to the
 * normal console output. The file is truncated when the logger starts, so
 * each process run begins with a clean file.
 */

import * as fs from 'fs';
import * as path from 'path';

type StreamWrite = NodeJS.WriteStream['write'];

let writeStream: fs.WriteStream | null = null;
let restore: Array<() => void> = [];

function tee(stream: NodeJS.WriteStream, sink: fs.WriteStream): () => void {
    const original: StreamWrite = stream.write;
    const hooked = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
        sink.write(chunk);
        return Reflect.apply(original, stream, [chunk, ...rest]);
    };
    stream.write = hooked;
    return () => {
        stream.write = original;
    };
}

/**
 * Start mirroring into `file`. Call once, before any log output.
 */
export function initFileLogger(file: string): void {
    if (writeStream) return;

    const target = path.resolve(process.cwd(), file);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, '', 'utf-8');
    writeStream = fs.createWriteStream(target, { flags: 'a', encoding: 'utf-8' });

    restore = [tee(process.stdout, writeStream), tee(process.stderr, writeStream)];
    console.log(`[FileLogger] ✓ Logging to ${target}`);
}

/**
 * Restore stdout/stderr and close the file. Call in the finally/cleanup block.
 */
export function closeFileLogger(): void {
    for (const undo of restore) undo();
    restore = [];

    if (writeStream) {
        writeStream.end();
        writeStream = null;
    }
}
