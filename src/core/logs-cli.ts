import { existsSync, watch } from 'node:fs';
import { open, readFile, stat } from 'node:fs/promises';
import { getDailyLogPath } from '../utils/logger.js';

const TAIL_BYTES = 4096;

/**
 * Handle `logs [--follow]`.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const logPath = getDailyLogPath();
    if (!existsSync(logPath)) {
        console.error(`[commitwatch logs] No logs found for today at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (argv.includes('--follow') || argv.includes('-f')) {
        console.log(`[commitwatch logs] Following ${logPath}...\n`);
        followLog(logPath);
        return true;
    }

    process.stdout.write(await readFile(logPath, 'utf8'));
    process.exitCode = 0;
    return true;
}

async function readRange(filePath: string, start: number, end: number): Promise<string> {
    const handle = await open(filePath, 'r');
    try {
        const buffer = Buffer.alloc(end - start);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
        return buffer.subarray(0, bytesRead).toString('utf8');
    } finally {
        await handle.close();
    }
}

/**
 * Print the last few KB of the log, then every line appended to it.
 * Reads run one at a time so appended chunks are printed in order.
 */
function followLog(filePath: string): void {
    let offset = 0;
    let queue: Promise<void> = Promise.resolve();

    const printAppended = async (fromEnd: boolean): Promise<void> => {
        try {
            const { size } = await stat(filePath);
            const start = fromEnd ? Math.max(0, size - TAIL_BYTES) : offset;
            // A shrinking file was truncated; resume from its new end.
            if (size > start) process.stdout.write(await readRange(filePath, start, size));
            offset = size;
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[commitwatch logs] Failed to read ${filePath}: ${message}`);
        }
    };

    queue = queue.then(() => printAppended(true));

    try {
        watch(filePath, (eventType) => {
            if (eventType !== 'change') return;
            queue = queue.then(() => printAppended(false));
        });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[commitwatch logs] Failed to watch ${filePath}: ${message}`);
    }
}
