import type { FilterHook } from '../types/watcher.js';

/**
 * Keep only entries whose base name (or full path, with `useFullPath`) matches
 * `pattern`.
 *
 * @example
 * ```ts
 * watcher.addFilterHook(regexFilterHook(/\.md$/, false));
 * ```
 */
export function regexFilterHook(pattern: RegExp, useFullPath: boolean): FilterHook {
    // A global or sticky pattern carries lastIndex between calls.
    const matcher = pattern.global || pattern.sticky
        ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
        : pattern;

    return (metadata, fullPath) => matcher.test(useFullPath ? fullPath : metadata.name);
}
