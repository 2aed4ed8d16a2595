import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';
import { configureLogger, getLogFilePath, logThought, resetLogger } from '../../src/utils/logger.js';

describe('logger', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pollwatch-log-'));
        resetLogger();
    });

    afterEach(async () => {
        resetLogger();
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('names the daily file after the UTC date', () => {
        configureLogger({ directory: tempDir });

        expect(getLogFilePath(new Date('2026-03-04T10:00:00Z'))).toBe(path.join(tempDir, '2026-03-04.md'));
    });

    it('falls back to POLLWATCH_LOG_DIR and is disabled without it', () => {
        vi.stubEnv('POLLWATCH_LOG_DIR', '');
        expect(getLogFilePath()).toBeNull();

        vi.stubEnv('POLLWATCH_LOG_DIR', tempDir);
        expect(getLogFilePath(new Date('2026-01-02T00:00:00Z'))).toBe(path.join(tempDir, '2026-01-02.md'));
    });

    it('appends timestamped markdown bullets', async () => {
        configureLogger({ directory: tempDir });

        await logThought('first');
        await logThought('second');

        const logPath = getLogFilePath();
        expect(logPath).not.toBeNull();
        const content = await fs.readFile(logPath ?? '', 'utf8');
        expect(content).toMatch(/^- \[\d{2}:\d{2}:\d{2}\] first\n- \[\d{2}:\d{2}:\d{2}\] second\n$/);
    });

    it('echoes to stdout when asked', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        configureLogger({ directory: null, echo: true });

        await logThought('visible');

        expect(log).toHaveBeenCalledTimes(1);
        expect(String(log.mock.calls[0][0])).toMatch(/^- \[\d{2}:\d{2}:\d{2}\] visible$/);
    });

    it('reports a failed write on stderr instead of rejecting', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const blocker = path.join(tempDir, 'not-a-dir');
        await fs.writeFile(blocker, 'x');
        configureLogger({ directory: blocker });

        await expect(logThought('lost')).resolves.toBeUndefined();

        expect(error).toHaveBeenCalledTimes(1);
        expect(String(error.mock.calls[0][0]).startsWith(`[Logger] Failed to write ${blocker}`)).toBe(true);
    });
});
