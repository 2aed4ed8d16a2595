import path from 'node:path';
import type { ReadonlySnapshot, Snapshot } from '../types/watcher.js';

type SnapshotEdit = (files: Snapshot) => void;

/** `candidate` is `base` itself or lies somewhere below it. */
export function isWithin(candidate: string, base: string): boolean {
    if (candidate === base) return true;
    const prefix = base.endsWith(path.sep) ? base : `${base}${path.sep}`;
    return candidate.startsWith(prefix);
}

/**
 * Last-observed state of every watched path, plus the registry of watch roots and
 * ignored paths.
 *
 * The store itself is synchronous; callers serialize access through the watcher's
 * mutex. While a poll cycle is in flight (between {@link beginCycle} and
 * {@link commit}), every edit is also recorded and replayed onto the fresh snapshot
 * at commit so the wholesale replace does not undo it.
 */
export class SnapshotStore {
    #files: Snapshot = new Map();
    readonly #roots: Map<string, boolean> = new Map();
    readonly #ignored: Set<string> = new Set();
    #pendingEdits: SnapshotEdit[] | null = null;

    addRoot(root: string, listing: ReadonlySnapshot): void {
        this.#register(root, false, listing);
    }

    addRootRecursive(root: string, listing: ReadonlySnapshot): void {
        this.#register(root, true, listing);
    }

    /** Drop the path and, for a directory, its immediate children only. */
    removeRoot(target: string): void {
        this.#roots.delete(target);
        this.#edit((files) => {
            files.delete(target);
            for (const key of [...files.keys()]) {
                if (path.dirname(key) === target) files.delete(key);
            }
        });
    }

    /**
     * Drop the path and every tracked entry below it. Matching stops at path
     * segments rather than raw string prefixes: `/a/b` leaves `/a/bc` alone.
     */
    removeRootRecursive(target: string): void {
        this.#roots.delete(target);
        this.#edit((files) => {
            for (const key of [...files.keys()]) {
                if (isWithin(key, target)) files.delete(key);
            }
        });
    }

    /** Purge the path (entries and roots at or below it) and blacklist it. */
    ignore(target: string): void {
        this.removeRootRecursive(target);
        for (const root of [...this.#roots.keys()]) {
            if (isWithin(root, target)) this.#roots.delete(root);
        }
        this.#ignored.add(target);
    }

    isIgnored(target: string): boolean {
        return this.#ignored.has(target);
    }

    /** Copy of the registry as `[path, recursive]` pairs, in registration order. */
    roots(): [string, boolean][] {
        return [...this.#roots.entries()];
    }

    /** Live map. Callers must not mutate it. */
    currentSnapshot(): ReadonlySnapshot {
        return this.#files;
    }

    beginCycle(): void {
        this.#pendingEdits = [];
    }

    /** Replace the snapshot wholesale, replaying edits made since {@link beginCycle}. */
    commit(next: Snapshot): void {
        for (const edit of this.#pendingEdits ?? []) {
            edit(next);
        }
        this.#files = next;
        this.#pendingEdits = null;
    }

    /** Forget every tracked entry and root. The ignore set survives. */
    clear(): void {
        this.#files = new Map();
        this.#roots.clear();
        this.#pendingEdits = null;
    }

    #register(root: string, recursive: boolean, listing: ReadonlySnapshot): void {
        this.#roots.set(root, recursive);
        const entries = [...listing];
        this.#edit((files) => {
            for (const [key, info] of entries) files.set(key, info);
        });
    }

    #edit(edit: SnapshotEdit): void {
        edit(this.#files);
        this.#pendingEdits?.push(edit);
    }
}
