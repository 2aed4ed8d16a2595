import path from 'node:path';
import { Channel } from '../utils/channel.js';
import { AsyncMutex } from '../utils/mutex.js';
import { logThought } from '../utils/logger.js';
import { diffSnapshots } from './diff-engine.js';
import { EventDispatcher } from './event-dispatcher.js';
import {
    PathLister,
    isHiddenName,
    isNotFoundError,
    type FileSystemAdapter,
    type ListOptions,
} from './path-lister.js';
import { SnapshotStore, isWithin } from './snapshot-store.js';
import {
    AlreadyRunningError,
    DurationTooShortError,
    ListingError,
    WatchedPathDeletedError,
    WatcherClosedError,
    type DescendantErrorPolicy,
    type DispatchPolicy,
    type FileMetadata,
    type FilterHook,
    type Operation,
    type Snapshot,
    type WatchEvent,
} from '../types/watcher.js';

export const MIN_INTERVAL_MS = 1;
const MAX_TIMER_MS = 2_147_483_647;

export interface PollWatcherOptions {
    /** Filesystem primitive used for every listing. Defaults to `node:fs`. */
    fileSystem?: FileSystemAdapter;
    /** @default 'abort' */
    descendantErrors?: DescendantErrorPolicy;
    /** Clock for triggered events. */
    now?: () => number;
}

type WatcherState = 'idle' | 'running' | 'closing' | 'closed';

interface GatheredCycle {
    next: Snapshot;
    events: WatchEvent[];
    failures: Error[];
}

function triggeredMetadata(now: number): FileMetadata {
    return {
        name: 'triggered event',
        size: 0,
        mode: 0,
        modTime: now,
        isDirectory: false,
        handle: null,
    };
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(done, Math.min(ms, MAX_TIMER_MS));
        function done(): void {
            clearTimeout(timer);
            signal.removeEventListener('abort', done);
            resolve();
        }
        signal.addEventListener('abort', done, { once: true });
    });
}

/**
 * Polling filesystem watcher.
 *
 * Each cycle lists every watch root, diffs the result against the last committed
 * snapshot, hands the events one by one to the consumer, commits, and sleeps.
 * Delivery is unbuffered: a consumer that stops reading stalls the loop, and so
 * does one that never drains `errors`.
 *
 * Usage:
 * ```ts
 * const watcher = new PollWatcher();
 * await watcher.addRecursive('./content');
 * const running = watcher.start(500);
 * for await (const event of watcher.events) console.log(formatEvent(event));
 * await running;
 * ```
 */
export class PollWatcher {
    readonly events = new Channel<WatchEvent>();
    readonly errors = new Channel<Error>();
    /** Settles once, when the loop has fully terminated. */
    readonly closed: Promise<void>;

    readonly #lister: PathLister;
    readonly #store = new SnapshotStore();
    readonly #mutex = new AsyncMutex();
    readonly #dispatcher: EventDispatcher;
    readonly #descendantErrors: DescendantErrorPolicy;
    readonly #now: () => number;
    readonly #started: Promise<void>;
    readonly #markStarted: () => void;
    readonly #markClosed: () => void;

    #operations: Set<Operation> = new Set();
    #maxEvents = 0;
    #ignoreHidden = false;
    readonly #filterHooks: FilterHook[] = [];

    #state: WatcherState = 'idle';
    #abort: AbortController | null = null;

    constructor(options: PollWatcherOptions = {}) {
        this.#lister = new PathLister(options.fileSystem);
        this.#dispatcher = new EventDispatcher(this.events, this.errors);
        this.#descendantErrors = options.descendantErrors ?? 'abort';
        this.#now = options.now ?? (() => Date.now());

        let markStarted = (): void => undefined;
        this.#started = new Promise<void>((resolve) => {
            markStarted = () => resolve();
        });
        this.#markStarted = markStarted;

        let markClosed = (): void => undefined;
        this.closed = new Promise<void>((resolve) => {
            markClosed = () => resolve();
        });
        this.#markClosed = markClosed;
    }

    get isRunning(): boolean {
        return this.#state === 'running';
    }

    // ── Configuration ──────────────────────────────────────────────────────────

    /** Watch a file, or a directory and its immediate children. */
    async add(target: string): Promise<void> {
        await this.#addRoot(target, false);
    }

    /** Watch a directory and everything below it. */
    async addRecursive(target: string): Promise<void> {
        await this.#addRoot(target, true);
    }

    async remove(target: string): Promise<void> {
        const resolved = path.resolve(target);
        await this.#mutex.runExclusive(() => this.#store.removeRoot(resolved));
    }

    async removeRecursive(target: string): Promise<void> {
        const resolved = path.resolve(target);
        await this.#mutex.runExclusive(() => this.#store.removeRootRecursive(resolved));
    }

    /** Stop tracking each path (and anything below it) and never list it again. */
    async ignore(...targets: string[]): Promise<void> {
        const resolved = targets.map((target) => path.resolve(target));
        await this.#mutex.runExclusive(() => {
            for (const target of resolved) this.#store.ignore(target);
        });
    }

    /** Cap on events forwarded per cycle; the rest of the cycle is dropped. 0 = unlimited. */
    setMaxEventsPerCycle(limit: number): void {
        this.#maxEvents = Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : 0;
    }

    ignoreHiddenFiles(ignore: boolean): void {
        this.#ignoreHidden = ignore;
    }

    /** Forward only these kinds. Call with no arguments to forward everything. */
    filterOperations(...ops: Operation[]): void {
        this.#operations = new Set(ops);
    }

    addFilterHook(hook: FilterHook): void {
        this.#filterHooks.push(hook);
    }

    /** Copy of the current snapshot. */
    watchedFiles(): Map<string, FileMetadata> {
        return new Map(this.#store.currentSnapshot());
    }

    // ── Lifecycle ──────────────────────────────────────────────────────────────

    /**
     * Run the poll loop. Resolves when the watcher has been closed; callers usually
     * keep the promise and let it run in the background.
     */
    async start(intervalMs: number): Promise<void> {
        if (!(intervalMs >= MIN_INTERVAL_MS)) {
            throw new DurationTooShortError(intervalMs);
        }
        if (this.#state === 'running') {
            throw new AlreadyRunningError();
        }
        if (this.#state !== 'idle') {
            throw new WatcherClosedError();
        }

        this.#state = 'running';
        const controller = new AbortController();
        this.#abort = controller;
        this.#markStarted();
        void logThought(`[PollWatcher] Started polling every ${intervalMs}ms.`);

        try {
            await this.#run(intervalMs, controller.signal);
        } finally {
            this.#terminate();
        }
    }

    /** Resolves once {@link start} has been called. */
    wait(): Promise<void> {
        return this.#started;
    }

    /**
     * Publish a synthetic event straight to `events`, outside the poll cycle.
     * Waits for the loop to start; resolves `false` if the watcher closes first.
     */
    async triggerEvent(op: Operation, metadata?: FileMetadata): Promise<boolean> {
        await this.wait();
        const controller = this.#abort;
        if (!controller) return false;

        return this.#dispatcher.publish(
            { op, path: '-', metadata: metadata ?? triggeredMetadata(this.#now()) },
            controller.signal,
        );
    }

    /** Stop the loop and forget all tracked state. No-op unless running. */
    close(): void {
        if (this.#state !== 'running') return;

        this.#state = 'closing';
        this.#store.clear();
        this.#abort?.abort();
    }

    // ── Poll loop ──────────────────────────────────────────────────────────────

    async #run(intervalMs: number, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            const policy = this.#dispatchPolicy();
            const cycle = await this.#mutex.runExclusive(() => this.#gather(signal));
            if (signal.aborted) return;

            for (const failure of cycle.failures) {
                if (!(await this.#dispatcher.reportError(failure, signal))) return;
            }

            const outcome = await this.#dispatcher.dispatchCycle(cycle.events, policy, signal);
            if (outcome.aborted) return;
            if (cycle.events.length > 0) {
                void logThought(
                    `[PollWatcher] Cycle delivered ${outcome.delivered}, filtered ${outcome.filtered}, truncated ${outcome.truncated} event(s).`,
                );
            }

            await this.#mutex.runExclusive(() => {
                if (!signal.aborted) this.#store.commit(cycle.next);
            });

            await sleep(intervalMs, signal);
        }
    }

    /** Listing pass plus diff. Runs under the mutex. */
    async #gather(signal: AbortSignal): Promise<GatheredCycle> {
        this.#store.beginCycle();
        const next: Snapshot = new Map();
        const failures: Error[] = [];
        const options = this.#listOptions();

        for (const [root, recursive] of this.#store.roots()) {
            if (signal.aborted) break;

            try {
                const listing = await this.#lister.list(root, recursive, options);
                for (const [key, info] of listing) next.set(key, info);
            } catch (err) {
                if (!(err instanceof ListingError) && isNotFoundError(err)) {
                    // Purged before diffing: a vanished root reports one error, not a remove per file.
                    if (recursive) {
                        this.#store.removeRootRecursive(root);
                    } else {
                        this.#store.removeRoot(root);
                    }
                    failures.push(new WatchedPathDeletedError(root));
                    void logThought(`[PollWatcher] Watched path deleted, no longer watching: ${root}`);
                    continue;
                }

                const failure = err instanceof ListingError ? err : new ListingError(root, err);
                failures.push(failure);
                this.#carryOver(root, recursive, next);
                void logThought(`[PollWatcher] ${failure.message}`);
            }
        }

        return { next, events: diffSnapshots(this.#store.currentSnapshot(), next), failures };
    }

    /** Keep a failed root's previous entries so a transient error reads as "no change". */
    #carryOver(root: string, recursive: boolean, next: Snapshot): void {
        for (const [key, info] of this.#store.currentSnapshot()) {
            const covered = key === root || (recursive ? isWithin(key, root) : path.dirname(key) === root);
            if (covered && !next.has(key)) next.set(key, info);
        }
    }

    #dispatchPolicy(): DispatchPolicy {
        return {
            operations: new Set(this.#operations),
            maxEvents: this.#maxEvents,
        };
    }

    #listOptions(): ListOptions {
        return {
            isIgnored: (fullPath) => this.#store.isIgnored(fullPath),
            ignoreHidden: this.#ignoreHidden,
            filterHooks: [...this.#filterHooks],
            descendantErrors: this.#descendantErrors,
        };
    }

    async #addRoot(target: string, recursive: boolean): Promise<void> {
        const resolved = path.resolve(target);

        await this.#mutex.runExclusive(async () => {
            if (this.#store.isIgnored(resolved)) return;
            if (this.#ignoreHidden && isHiddenName(path.basename(resolved))) return;

            const listing = await this.#lister.list(resolved, recursive, this.#listOptions());
            // close() may have cleared the store while the listing was in flight.
            if (this.#state === 'closing' || this.#state === 'closed') return;
            if (recursive) {
                this.#store.addRootRecursive(resolved, listing);
            } else {
                this.#store.addRoot(resolved, listing);
            }
        });
    }

    #terminate(): void {
        this.#state = 'closed';
        this.#store.clear();
        this.events.close();
        this.errors.close();
        this.#markClosed();
        void logThought('[PollWatcher] Closed.');
    }
}
