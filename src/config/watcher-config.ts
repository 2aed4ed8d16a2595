import * as fs from 'node:fs/promises';
import path from 'node:path';
import { getEnvKeySpec } from './env-schema.js';
import type { PollWatcher } from '../services/poll-watcher.js';
import { OPERATIONS, type DescendantErrorPolicy, type Operation } from '../types/watcher.js';

export interface PollWatchConfig {
    /** Paths registered as watch roots. */
    paths: string[];
    intervalMs: number;
    recursive: boolean;
    ignoreHidden: boolean;
    /** 0 = unlimited. */
    maxEventsPerCycle: number;
    /** Empty = forward every operation. */
    operations: Operation[];
    ignore: string[];
    descendantErrors: DescendantErrorPolicy;
    /** Shell command run for each event (CLI only). */
    command: string | null;
    logDir: string | null;
}

export interface ConfigIssue {
    /** Config field or env key the issue is about. */
    key: string;
    message: string;
    remediation: string;
}

export interface ConfigValidationResult {
    ok: boolean;
    issues: ConfigIssue[];
}

export const DEFAULT_CONFIG: PollWatchConfig = {
    paths: ['.'],
    intervalMs: 100,
    recursive: true,
    ignoreHidden: false,
    maxEventsPerCycle: 0,
    operations: [],
    ignore: [],
    descendantErrors: 'abort',
    command: null,
    logDir: null,
};

const DEFAULT_CONFIG_FILE = 'pollwatch.json';

export function isOperation(value: string): value is Operation {
    return OPERATIONS.some((op) => op === value);
}

function isDescendantErrorPolicy(value: unknown): value is DescendantErrorPolicy {
    return value === 'abort' || value === 'skip';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] | undefined {
    if (!Array.isArray(value)) return undefined;
    return value.filter((item): item is string => typeof item === 'string');
}

function splitList(raw: string): string[] {
    return raw
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

function cloneDefaults(): PollWatchConfig {
    return {
        ...DEFAULT_CONFIG,
        paths: [...DEFAULT_CONFIG.paths],
        operations: [...DEFAULT_CONFIG.operations],
        ignore: [...DEFAULT_CONFIG.ignore],
    };
}

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    const fromEnv = process.env.POLLWATCH_CONFIG_PATH?.trim();
    if (fromEnv) return path.resolve(fromEnv);
    return path.resolve(DEFAULT_CONFIG_FILE);
}

/**
 * Load the JSON config file over the defaults.
 * A missing file yields the defaults; an unreadable or malformed one throws.
 */
export async function readConfig(overridePath?: string): Promise<PollWatchConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return cloneDefaults();
        }
        const detail = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to read config file at ${targetPath}: ${detail}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${detail}`);
    }
}

/** Fields of the wrong type are ignored and keep their default. */
export function mergeWithDefaults(loaded: unknown): PollWatchConfig {
    const config = cloneDefaults();
    if (!isRecord(loaded)) return config;

    const paths = stringList(loaded.paths);
    if (paths) config.paths = paths;
    if (typeof loaded.intervalMs === 'number') config.intervalMs = loaded.intervalMs;
    if (typeof loaded.recursive === 'boolean') config.recursive = loaded.recursive;
    if (typeof loaded.ignoreHidden === 'boolean') config.ignoreHidden = loaded.ignoreHidden;
    if (typeof loaded.maxEventsPerCycle === 'number') config.maxEventsPerCycle = loaded.maxEventsPerCycle;
    const operations = stringList(loaded.operations);
    if (operations) config.operations = operations.map((op) => op.toLowerCase()).filter(isOperation);
    const ignore = stringList(loaded.ignore);
    if (ignore) config.ignore = ignore;
    if (isDescendantErrorPolicy(loaded.descendantErrors)) config.descendantErrors = loaded.descendantErrors;
    if (typeof loaded.command === 'string' || loaded.command === null) config.command = loaded.command;
    if (typeof loaded.logDir === 'string' || loaded.logDir === null) config.logDir = loaded.logDir;

    return config;
}

function envIssue(key: string, message: string): ConfigIssue {
    return {
        key,
        message,
        remediation: getEnvKeySpec(key)?.remediation ?? `Check the value of ${key}.`,
    };
}

function parseBoolean(raw: string): boolean | null {
    const normalized = raw.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    return null;
}

function parseInteger(raw: string): number | null {
    const trimmed = raw.trim();
    if (!/^-?\d+$/.test(trimmed)) return null;
    return Number(trimmed);
}

/**
 * Layer `POLLWATCH_*` environment variables over `config`.
 * Unparseable values are reported and leave the config value untouched.
 */
export function applyEnvOverrides(
    config: PollWatchConfig,
    env: NodeJS.ProcessEnv = process.env,
): { config: PollWatchConfig; issues: ConfigIssue[] } {
    const next: PollWatchConfig = { ...config };
    const issues: ConfigIssue[] = [];

    const interval = env.POLLWATCH_INTERVAL_MS;
    if (interval !== undefined && interval.trim() !== '') {
        const parsed = parseInteger(interval);
        if (parsed === null) {
            issues.push(envIssue('POLLWATCH_INTERVAL_MS', `POLLWATCH_INTERVAL_MS must be an integer, got '${interval.trim()}'.`));
        } else {
            next.intervalMs = parsed;
        }
    }

    const maxEvents = env.POLLWATCH_MAX_EVENTS;
    if (maxEvents !== undefined && maxEvents.trim() !== '') {
        const parsed = parseInteger(maxEvents);
        if (parsed === null) {
            issues.push(envIssue('POLLWATCH_MAX_EVENTS', `POLLWATCH_MAX_EVENTS must be an integer, got '${maxEvents.trim()}'.`));
        } else {
            next.maxEventsPerCycle = parsed;
        }
    }

    for (const [key, field] of [
        ['POLLWATCH_RECURSIVE', 'recursive'],
        ['POLLWATCH_IGNORE_HIDDEN', 'ignoreHidden'],
    ] as const) {
        const raw = env[key];
        if (raw === undefined || raw.trim() === '') continue;
        const parsed = parseBoolean(raw);
        if (parsed === null) {
            issues.push(envIssue(key, `${key} must be a boolean, got '${raw.trim()}'.`));
        } else {
            next[field] = parsed;
        }
    }

    const ops = env.POLLWATCH_OPS;
    if (ops !== undefined && ops.trim() !== '') {
        const requested = splitList(ops).map((op) => op.toLowerCase());
        const unknown = requested.filter((op) => !isOperation(op));
        if (unknown.length > 0) {
            issues.push(envIssue('POLLWATCH_OPS', `POLLWATCH_OPS has unknown operation(s): ${unknown.join(', ')}.`));
        }
        next.operations = requested.filter(isOperation);
    }

    const ignore = env.POLLWATCH_IGNORE;
    if (ignore !== undefined && ignore.trim() !== '') {
        next.ignore = splitList(ignore);
    }

    const descendantErrors = env.POLLWATCH_DESCENDANT_ERRORS;
    if (descendantErrors !== undefined && descendantErrors.trim() !== '') {
        const normalized = descendantErrors.trim().toLowerCase();
        if (isDescendantErrorPolicy(normalized)) {
            next.descendantErrors = normalized;
        } else {
            issues.push(envIssue('POLLWATCH_DESCENDANT_ERRORS', `POLLWATCH_DESCENDANT_ERRORS must be 'abort' or 'skip', got '${descendantErrors.trim()}'.`));
        }
    }

    const logDir = env.POLLWATCH_LOG_DIR;
    if (logDir !== undefined && logDir.trim() !== '') {
        next.logDir = logDir.trim();
    }

    return { config: next, issues };
}

export function validateConfig(config: PollWatchConfig): ConfigValidationResult {
    const issues: ConfigIssue[] = [];

    if (!Number.isInteger(config.intervalMs) || config.intervalMs < 1) {
        issues.push({
            key: 'intervalMs',
            message: `intervalMs must be an integer of at least 1, got ${config.intervalMs}.`,
            remediation: 'Use a poll interval of 1ms or more; 100–1000ms suits most trees.',
        });
    }

    if (!Number.isInteger(config.maxEventsPerCycle) || config.maxEventsPerCycle < 0) {
        issues.push({
            key: 'maxEventsPerCycle',
            message: `maxEventsPerCycle must be a non-negative integer, got ${config.maxEventsPerCycle}.`,
            remediation: 'Use 0 for no cap, or a positive event count.',
        });
    }

    if (config.paths.length === 0) {
        issues.push({
            key: 'paths',
            message: 'No paths to watch.',
            remediation: 'Pass at least one path on the command line or in the config file.',
        });
    }

    return { ok: issues.length === 0, issues };
}

/** Register the config's paths and dispatch policy on `watcher`. Ignores are applied first. */
export async function applyConfig(watcher: PollWatcher, config: PollWatchConfig): Promise<void> {
    watcher.ignoreHiddenFiles(config.ignoreHidden);
    watcher.setMaxEventsPerCycle(config.maxEventsPerCycle);
    watcher.filterOperations(...config.operations);
    if (config.ignore.length > 0) {
        await watcher.ignore(...config.ignore);
    }

    for (const target of config.paths) {
        if (config.recursive) {
            await watcher.addRecursive(target);
        } else {
            await watcher.add(target);
        }
    }
}
