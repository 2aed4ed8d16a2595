import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { logThought } from '../utils/logger.js';
import {
    ListingError,
    type DescendantErrorPolicy,
    type FileMetadata,
    type FilterHook,
    type Snapshot,
} from '../types/watcher.js';

/**
 * The primitive the lister is built on: stat one path, or read the metadata of a
 * directory's immediate children. Swappable so tests can run against an in-memory tree.
 */
export interface FileSystemAdapter {
    /** Metadata of `target` itself, following symlinks. */
    stat(target: string): Promise<FileMetadata>;
    /** Metadata of each immediate child of `directory`, without following symlinks. */
    readDir(directory: string): Promise<FileMetadata[]>;
}

export interface ListOptions {
    isIgnored: (fullPath: string) => boolean;
    ignoreHidden: boolean;
    filterHooks: readonly FilterHook[];
    descendantErrors: DescendantErrorPolicy;
}

export function isNotFoundError(err: unknown): boolean {
    if (!(err instanceof Error) || !('code' in err)) return false;
    return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

export function isHiddenName(name: string): boolean {
    return name.startsWith('.');
}

export function toMetadata(name: string, stats: Stats): FileMetadata {
    return {
        name,
        size: stats.size,
        mode: stats.mode & 0o7777,
        modTime: stats.mtimeMs,
        isDirectory: stats.isDirectory(),
        handle: { dev: stats.dev, ino: stats.ino },
    };
}

/** Adapter backed by `node:fs/promises`. */
export const nodeFileSystem: FileSystemAdapter = {
    async stat(target) {
        const stats = await fs.stat(target);
        return toMetadata(path.basename(target), stats);
    },

    async readDir(directory) {
        const names = await fs.readdir(directory);
        const entries: FileMetadata[] = [];
        for (const name of names) {
            try {
                entries.push(toMetadata(name, await fs.lstat(path.join(directory, name))));
            } catch (err) {
                // Removed between readdir and lstat; the next cycle reports it.
                if (isNotFoundError(err)) continue;
                throw err;
            }
        }
        return entries;
    },
};

/**
 * Produces the snapshot for one watch root.
 *
 * A file root yields a single entry. A directory root yields itself plus its
 * immediate children, or every descendant when `recursive` is set. Ignored and
 * (optionally) hidden entries are skipped along with their whole subtree; entries
 * rejected by a filter hook are left out but still descended into.
 *
 * Rejects with the raw error when the root cannot be stat'ed. Errors below the
 * root reject with a {@link ListingError} naming the failing path, unless the
 * policy is `'skip'`.
 */
export class PathLister {
    readonly #fileSystem: FileSystemAdapter;

    constructor(fileSystem: FileSystemAdapter = nodeFileSystem) {
        this.#fileSystem = fileSystem;
    }

    async list(root: string, recursive: boolean, options: ListOptions): Promise<Snapshot> {
        const snapshot: Snapshot = new Map();
        const rootInfo = await this.#fileSystem.stat(root);
        snapshot.set(root, rootInfo);

        if (rootInfo.isDirectory) {
            await this.#listChildren(root, recursive, options, snapshot, true);
        }
        return snapshot;
    }

    async #listChildren(
        directory: string,
        recursive: boolean,
        options: ListOptions,
        snapshot: Snapshot,
        isRoot: boolean,
    ): Promise<void> {
        let children: FileMetadata[];
        try {
            children = await this.#fileSystem.readDir(directory);
        } catch (err) {
            if (isRoot) throw err;
            // A subdirectory removed mid-walk is a change, not a failure.
            if (isNotFoundError(err)) return;
            if (options.descendantErrors === 'abort') {
                throw new ListingError(directory, err);
            }
            const detail = err instanceof Error ? err.message : String(err);
            void logThought(`[PathLister] Skipping unreadable directory ${directory}: ${detail}`);
            return;
        }

        const ordered = [...children].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const child of ordered) {
            const fullPath = path.join(directory, child.name);
            if (options.isIgnored(fullPath) || (options.ignoreHidden && isHiddenName(child.name))) {
                continue;
            }

            if (options.filterHooks.every((hook) => hook(child, fullPath))) {
                snapshot.set(fullPath, child);
            }

            if (recursive && child.isDirectory) {
                await this.#listChildren(fullPath, recursive, options, snapshot, false);
            }
        }
    }
}
