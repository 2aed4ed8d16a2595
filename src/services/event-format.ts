import type { Operation, WatchEvent } from '../types/watcher.js';

export function formatOperation(op: Operation): string {
    return op.toUpperCase();
}

/** One-line rendering, e.g. `FILE "notes.md" WRITE [/srv/notes.md]`. */
export function formatEvent(event: WatchEvent): string {
    const kind = event.metadata.isDirectory ? 'DIRECTORY' : 'FILE';
    return `${kind} ${JSON.stringify(event.metadata.name)} ${formatOperation(event.op)} [${event.path}]`;
}
