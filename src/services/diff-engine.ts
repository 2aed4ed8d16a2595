import path from 'node:path';
import type { FileMetadata, ReadonlySnapshot, WatchEvent } from '../types/watcher.js';

/**
 * Heuristic identity: same size, modification time and permission bits.
 * Two distinct files with coincidentally equal metadata compare as the same file.
 */
export function isSameFile(a: FileMetadata, b: FileMetadata): boolean {
    return a.size === b.size && a.modTime === b.modTime && a.mode === b.mode;
}

/**
 * Compare two generations of watched state.
 *
 * Events come out in four groups: write/chmod, then rename/move, then the
 * remaining creates, then the remaining removes. Within a group the order follows
 * map insertion order (the previous snapshot for removal candidates, the current
 * one for everything else).
 *
 * Rename/move pairing is pairwise over removal × creation candidates; each
 * candidate is consumed by at most one pair.
 */
export function diffSnapshots(previous: ReadonlySnapshot, current: ReadonlySnapshot): WatchEvent[] {
    const events: WatchEvent[] = [];
    const removes = new Map<string, FileMetadata>();
    const creates = new Map<string, FileMetadata>();

    for (const [filePath, info] of previous) {
        if (!current.has(filePath)) removes.set(filePath, info);
    }

    for (const [filePath, info] of current) {
        const before = previous.get(filePath);
        if (!before) {
            creates.set(filePath, info);
            continue;
        }
        if (before.modTime !== info.modTime) {
            events.push({ op: 'write', path: filePath, metadata: info });
        }
        if (before.mode !== info.mode) {
            events.push({ op: 'chmod', path: filePath, metadata: info });
        }
    }

    for (const [oldPath, oldInfo] of removes) {
        for (const [newPath, newInfo] of creates) {
            if (!isSameFile(oldInfo, newInfo)) continue;

            events.push({
                op: path.dirname(oldPath) === path.dirname(newPath) ? 'rename' : 'move',
                path: `${oldPath} -> ${newPath}`,
                oldPath,
                metadata: oldInfo,
            });
            removes.delete(oldPath);
            creates.delete(newPath);
            break;
        }
    }

    for (const [filePath, info] of creates) {
        events.push({ op: 'create', path: filePath, metadata: info });
    }
    for (const [filePath, info] of removes) {
        events.push({ op: 'remove', path: filePath, metadata: info });
    }

    return events;
}
