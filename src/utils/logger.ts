import * as fs from 'node:fs/promises';
import path from 'node:path';

export interface LoggerOptions {
    /** Directory holding the daily `<YYYY-MM-DD>.md` log files. `null` disables file output. */
    directory?: string | null;
    /** Mirror every entry to stdout. */
    echo?: boolean;
}

interface LoggerState {
    directory: string | null | undefined;
    echo: boolean;
}

const state: LoggerState = {
    directory: undefined,
    echo: false,
};

/** Override where and whether log entries are written. Unset fields keep their value. */
export function configureLogger(options: LoggerOptions): void {
    if (options.directory !== undefined) {
        state.directory = options.directory === null ? null : path.resolve(options.directory);
    }
    if (options.echo !== undefined) {
        state.echo = options.echo;
    }
}

/** Restore the environment-driven defaults. */
export function resetLogger(): void {
    state.directory = undefined;
    state.echo = false;
}

function resolveDirectory(): string | null {
    if (state.directory !== undefined) return state.directory;
    const fromEnv = process.env.POLLWATCH_LOG_DIR?.trim();
    return fromEnv ? path.resolve(fromEnv) : null;
}

export function getLogFilePath(now: Date = new Date()): string | null {
    const directory = resolveDirectory();
    if (!directory) return null;
    return path.join(directory, `${now.toISOString().slice(0, 10)}.md`);
}

/**
 * Append one entry to the daily log.
 * Never rejects: a failed write is reported on stderr.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const line = `- [${now.toISOString().slice(11, 19)}] ${message}`;

    if (state.echo) {
        console.log(line);
    }

    const logPath = getLogFilePath(now);
    if (!logPath) return;

    try {
        await fs.mkdir(path.dirname(logPath), { recursive: true });
        await fs.appendFile(logPath, `${line}\n`, 'utf8');
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write ${logPath}: ${detail}`);
    }
}
