import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = 'logs';

/** Directory holding the daily log files. */
export function getLogDir(): string {
    return path.resolve(process.env.COMMITWATCH_LOG_DIR ?? DEFAULT_LOG_DIR);
}

/** Path of the log file for the given day (`<logDir>/<YYYY-MM-DD>.md`). */
export function getDailyLogPath(date: Date = new Date()): string {
    return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

/** Render a log line. Newlines are folded so one entry stays on one line. */
export function formatLogLine(message: string, date: Date = new Date()): string {
    const time = date.toISOString().slice(11, 19);
    return `- ${time} ${message.replace(/\r?\n/g, ' ')}\n`;
}

/**
 * Append an operational note to today's log file.
 * Never rejects: a failed write is reported on stderr and dropped.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const logPath = getDailyLogPath(now);
    try {
        await mkdir(path.dirname(logPath), { recursive: true });
        await appendFile(logPath, formatLogLine(message, now), 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write ${logPath}: ${reason}`);
    }
}
