import { spawn } from 'node:child_process';
import {
    DEFAULT_CONFIG,
    applyConfig,
    applyEnvOverrides,
    isOperation,
    readConfig,
    validateConfig,
    type ConfigIssue,
    type PollWatchConfig,
} from '../config/watcher-config.js';
import { ENV_SCHEMA } from '../config/env-schema.js';
import { formatEvent } from '../services/event-format.js';
import { PollWatcher } from '../services/poll-watcher.js';
import { configureLogger, logThought } from '../utils/logger.js';
import type { WatchEvent } from '../types/watcher.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: pollwatch [paths...] [options]

Watches files and directories by polling and prints one line per change.

Options:
  --interval <ms>       Delay between poll cycles (default: ${DEFAULT_CONFIG.intervalMs})
  --recursive           Watch directories recursively (default)
  --no-recursive        Watch only the immediate children of directories
  --dotfiles            Include hidden files (default)
  --no-dotfiles         Skip entries whose name starts with a dot
  --ignore <a,b>        Comma-separated paths to ignore
  --ops <a,b>           Only report these operations (create,write,remove,rename,chmod,move)
  --max-events <n>      Maximum events reported per cycle (0 = unlimited)
  --list                Print every watched path at startup
  --cmd <command>       Run a shell command for each event
  --config <file>       JSON config file (default: ./pollwatch.json)
  --verbose             Echo internal log entries to stdout
  --help, -h            Show this help message

Environment:
${ENV_SCHEMA.map((spec) => `  ${spec.key.padEnd(28)} ${spec.description}`).join('\n')}

  POLLWATCH_EVENT_OP and POLLWATCH_EVENT_PATH are set for --cmd.

Examples:
  pollwatch ./src --interval 500
  pollwatch ./notes --ops create,remove --no-dotfiles
  pollwatch ./site --cmd "npm run build"
`.trim();

// ── Argument parsing ─────────────────────────────────────────────────────────

export interface CliOptions {
    paths: string[];
    configPath?: string;
    overrides: Partial<PollWatchConfig>;
    list: boolean;
    verbose: boolean;
}

export type CliParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

const VALUE_FLAGS = new Set(['--interval', '--ignore', '--ops', '--max-events', '--cmd', '--config']);

function splitList(raw: string): string[] {
    return raw
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

function parseCount(flag: string, raw: string): number | string {
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) {
        return `${flag} expects a whole number, got '${raw}'.`;
    }
    return Number(trimmed);
}

export function parseCliArgs(argv: string[]): CliParseResult {
    const options: CliOptions = { paths: [], overrides: {}, list: false, verbose: false };

    for (let index = 0; index < argv.length; index++) {
        const arg = argv[index];

        if (!arg.startsWith('--')) {
            options.paths.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        let value: string | undefined;
        if (VALUE_FLAGS.has(flag)) {
            value = eq === -1 ? argv[++index] : arg.slice(eq + 1);
            if (value === undefined) {
                return { ok: false, error: `${flag} expects a value.` };
            }
        } else if (eq !== -1) {
            return { ok: false, error: `${flag} does not take a value.` };
        }

        switch (flag) {
            case '--interval':
            case '--max-events': {
                const parsed = parseCount(flag, value ?? '');
                if (typeof parsed === 'string') return { ok: false, error: parsed };
                if (flag === '--interval') {
                    options.overrides.intervalMs = parsed;
                } else {
                    options.overrides.maxEventsPerCycle = parsed;
                }
                break;
            }
            case '--ignore':
                options.overrides.ignore = splitList(value ?? '');
                break;
            case '--ops': {
                const requested = splitList(value ?? '').map((op) => op.toLowerCase());
                const unknown = requested.filter((op) => !isOperation(op));
                if (unknown.length > 0) {
                    return { ok: false, error: `Unknown operation(s): ${unknown.join(', ')}.` };
                }
                options.overrides.operations = requested.filter(isOperation);
                break;
            }
            case '--cmd':
                options.overrides.command = value ?? null;
                break;
            case '--config':
                options.configPath = value;
                break;
            case '--recursive':
                options.overrides.recursive = true;
                break;
            case '--no-recursive':
                options.overrides.recursive = false;
                break;
            case '--dotfiles':
                options.overrides.ignoreHidden = false;
                break;
            case '--no-dotfiles':
                options.overrides.ignoreHidden = true;
                break;
            case '--list':
                options.list = true;
                break;
            case '--verbose':
                options.verbose = true;
                break;
            default:
                return { ok: false, error: `Unknown option: '${flag}'` };
        }
    }

    if (options.paths.length > 0) {
        options.overrides.paths = options.paths;
    }
    return { ok: true, options };
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

function reportIssues(issues: readonly ConfigIssue[]): void {
    for (const issue of issues) {
        console.error(`[pollwatch] ${issue.message} ${issue.remediation}`);
    }
}

/** Run `command` through the shell with the event exposed in its environment. */
export function runEventCommand(command: string, event: WatchEvent): Promise<number> {
    return new Promise((resolve) => {
        const child = spawn(command, {
            shell: true,
            stdio: 'inherit',
            env: {
                ...process.env,
                POLLWATCH_EVENT_OP: event.op,
                POLLWATCH_EVENT_PATH: event.path,
            },
        });
        child.on('error', (err) => {
            console.error(`[pollwatch] Failed to run '${command}': ${err.message}`);
            resolve(1);
        });
        child.on('close', (code) => resolve(code ?? 1));
    });
}

/** Resolve file config, env overrides and CLI flags, in increasing precedence. */
export async function resolveCliConfig(
    options: CliOptions,
    env: NodeJS.ProcessEnv = process.env,
): Promise<{ config: PollWatchConfig; issues: ConfigIssue[] }> {
    const fromFile = await readConfig(options.configPath);
    const { config: fromEnv, issues } = applyEnvOverrides(fromFile, env);
    const config: PollWatchConfig = { ...fromEnv, ...options.overrides };
    return { config, issues: [...issues, ...validateConfig(config).issues] };
}

export interface WatchCliDeps {
    /** Stops the watcher when aborted. SIGINT/SIGTERM are wired when omitted. */
    signal?: AbortSignal;
    createWatcher?: (config: PollWatchConfig) => PollWatcher;
}

/**
 * Handle the default watch command. Resolves with the process exit code once the
 * watcher has been closed.
 */
export async function runWatchCli(argv: string[], deps: WatchCliDeps = {}): Promise<number> {
    const parsed = parseCliArgs(argv);
    if (!parsed.ok) {
        console.error(`[pollwatch] ${parsed.error}`);
        console.error(`Run 'pollwatch --help' to see available options.`);
        return 1;
    }

    let resolved: { config: PollWatchConfig; issues: ConfigIssue[] };
    try {
        resolved = await resolveCliConfig(parsed.options);
    } catch (error) {
        console.error(`[pollwatch] ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
    if (resolved.issues.length > 0) {
        reportIssues(resolved.issues);
        return 1;
    }

    const { config } = resolved;
    configureLogger({ directory: config.logDir, echo: parsed.options.verbose });

    const watcher = deps.createWatcher
        ? deps.createWatcher(config)
        : new PollWatcher({ descendantErrors: config.descendantErrors });

    try {
        await applyConfig(watcher, config);
    } catch (error) {
        console.error(`[pollwatch] ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }

    if (parsed.options.list) {
        for (const [filePath, info] of watcher.watchedFiles()) {
            console.log(`${filePath}: ${info.isDirectory ? 'DIRECTORY' : 'FILE'} ${info.size} bytes`);
        }
    }

    const stop = (): void => watcher.close();
    const detach = attachStopSignals(stop, deps.signal);

    const running = watcher.start(config.intervalMs);
    void logThought(`[pollwatch] Watching ${config.paths.join(', ')}.`);

    const consumeEvents = async (): Promise<void> => {
        for await (const event of watcher.events) {
            console.log(formatEvent(event));
            if (config.command) {
                const code = await runEventCommand(config.command, event);
                if (code !== 0) {
                    console.error(`[pollwatch] Command exited with code ${code}.`);
                }
            }
        }
    };

    const consumeErrors = async (): Promise<void> => {
        for await (const error of watcher.errors) {
            console.error(`[pollwatch] ${error.message}`);
        }
    };

    try {
        await Promise.all([running, consumeEvents(), consumeErrors()]);
        return 0;
    } catch (error) {
        console.error(`[pollwatch] ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    } finally {
        detach();
    }
}

function attachStopSignals(stop: () => void, signal?: AbortSignal): () => void {
    if (signal) {
        if (signal.aborted) {
            queueMicrotask(stop);
            return () => undefined;
        }
        signal.addEventListener('abort', stop, { once: true });
        return () => signal.removeEventListener('abort', stop);
    }

    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
    return () => {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
    };
}
