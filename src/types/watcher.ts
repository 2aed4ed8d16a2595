/** Kinds of change the watcher emits. */
export type Operation = 'create' | 'write' | 'remove' | 'rename' | 'chmod' | 'move';

export const OPERATIONS: readonly Operation[] = ['create', 'write', 'remove', 'rename', 'chmod', 'move'];

/** Device/inode pair reported by the filesystem. Opaque to the diff. */
export interface FileHandle {
    dev: number;
    ino: number;
}

/**
 * Metadata captured for one path at one point in time.
 * A later stat of the same path produces a new value.
 */
export interface FileMetadata {
    /** Base name of the entry. */
    readonly name: string;
    readonly size: number;
    /** Permission bits only (`mode & 0o7777`). */
    readonly mode: number;
    /** Modification time in epoch milliseconds. */
    readonly modTime: number;
    readonly isDirectory: boolean;
    readonly handle: FileHandle | null;
}

/** Absolute path → metadata for every watched entry. */
export type Snapshot = Map<string, FileMetadata>;

/** Read-only view handed to callers that must not mutate the live map. */
export type ReadonlySnapshot = ReadonlyMap<string, FileMetadata>;

/** A change delivered on the public event channel. */
export interface WatchEvent {
    op: Operation;
    /** Affected path. For rename/move this is `"<old> -> <new>"`. */
    path: string;
    /** Previous location, set for rename/move only. */
    oldPath?: string;
    metadata: FileMetadata;
}

/**
 * Predicate consulted for each entry found while listing a directory.
 * Returning `false` leaves the entry out of the snapshot.
 */
export type FilterHook = (metadata: FileMetadata, fullPath: string) => boolean;

/** What a walk does when a descendant (not the root) cannot be read. */
export type DescendantErrorPolicy = 'abort' | 'skip';

/** Dispatch policy captured once at the start of each poll cycle. */
export interface DispatchPolicy {
    /** Forward only these kinds. Empty = forward everything. */
    operations: ReadonlySet<Operation>;
    /** Per-cycle cap on forwarded events. 0 = unlimited. */
    maxEvents: number;
}

// ── Errors ────────────────────────────────────────────────────────────────────

export type WatcherErrorCode =
    | 'duration_too_short'
    | 'already_running'
    | 'watched_path_deleted'
    | 'listing_failed'
    | 'watcher_closed';

export class WatcherError extends Error {
    readonly code: WatcherErrorCode;

    constructor(code: WatcherErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'WatcherError';
        this.code = code;
    }
}

export class DurationTooShortError extends WatcherError {
    readonly intervalMs: number;

    constructor(intervalMs: number) {
        super('duration_too_short', `Poll interval must be at least 1ms, got ${intervalMs}.`);
        this.name = 'DurationTooShortError';
        this.intervalMs = intervalMs;
    }
}

export class AlreadyRunningError extends WatcherError {
    constructor() {
        super('already_running', 'Watcher is already running.');
        this.name = 'AlreadyRunningError';
    }
}

export class WatchedPathDeletedError extends WatcherError {
    readonly path: string;

    constructor(path: string) {
        super('watched_path_deleted', `Watched file or folder deleted: ${path}`);
        this.name = 'WatchedPathDeletedError';
        this.path = path;
    }
}

export class ListingError extends WatcherError {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super('listing_failed', `Failed to list ${path}: ${detail}`, { cause });
        this.name = 'ListingError';
        this.path = path;
    }
}

export class WatcherClosedError extends WatcherError {
    constructor() {
        super('watcher_closed', 'Watcher has been closed and cannot be restarted.');
        this.name = 'WatcherClosedError';
    }
}
