/**
 * Registry of every environment key pollwatch reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the value is invalid.
 */

export interface EnvKeySpec {
    key: string;
    description: string;
    remediation: string;
}

export const ENV_SCHEMA: readonly EnvKeySpec[] = [
    {
        key: 'POLLWATCH_CONFIG_PATH',
        description: 'Location of the JSON config file (default: ./pollwatch.json).',
        remediation: 'Point POLLWATCH_CONFIG_PATH at a readable JSON file.',
    },
    {
        key: 'POLLWATCH_INTERVAL_MS',
        description: 'Delay between poll cycles in milliseconds.',
        remediation: 'Set POLLWATCH_INTERVAL_MS to a whole number of at least 1, e.g. POLLWATCH_INTERVAL_MS=500.',
    },
    {
        key: 'POLLWATCH_RECURSIVE',
        description: 'Watch directories recursively.',
        remediation: "Set POLLWATCH_RECURSIVE to 'true' or 'false'.",
    },
    {
        key: 'POLLWATCH_IGNORE_HIDDEN',
        description: 'Skip entries whose name starts with a dot.',
        remediation: "Set POLLWATCH_IGNORE_HIDDEN to 'true' or 'false'.",
    },
    {
        key: 'POLLWATCH_MAX_EVENTS',
        description: 'Maximum events delivered per cycle (0 = unlimited).',
        remediation: 'Set POLLWATCH_MAX_EVENTS to a whole number of 0 or more.',
    },
    {
        key: 'POLLWATCH_OPS',
        description: 'Comma-separated operations to forward (create,write,remove,rename,chmod,move).',
        remediation: 'List only known operations, e.g. POLLWATCH_OPS=create,remove.',
    },
    {
        key: 'POLLWATCH_IGNORE',
        description: 'Comma-separated paths excluded from watching.',
        remediation: 'Separate paths with commas, e.g. POLLWATCH_IGNORE=./dist,./node_modules.',
    },
    {
        key: 'POLLWATCH_DESCENDANT_ERRORS',
        description: "What a recursive walk does when a subdirectory cannot be read.",
        remediation: "Set POLLWATCH_DESCENDANT_ERRORS to 'abort' or 'skip'.",
    },
    {
        key: 'POLLWATCH_LOG_DIR',
        description: 'Directory for the daily markdown log files. Unset disables file logging.',
        remediation: 'Point POLLWATCH_LOG_DIR at a writable directory.',
    },
];

export function getEnvKeySpec(key: string): EnvKeySpec | undefined {
    return ENV_SCHEMA.find((spec) => spec.key === key);
}
