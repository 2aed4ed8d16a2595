/**
 * FIFO exclusive lock for async critical sections.
 *
 * Usage:
 * ```ts
 * const mutex = new AsyncMutex();
 * await mutex.runExclusive(async () => { … });
 * ```
 */
export class AsyncMutex {
    readonly #waiters: (() => void)[] = [];
    #locked = false;

    get locked(): boolean {
        return this.#locked;
    }

    /** Resolves with a release function once the lock is held. */
    acquire(): Promise<() => void> {
        return new Promise((resolve) => {
            const grant = (): void => {
                this.#locked = true;
                let released = false;
                resolve(() => {
                    if (released) return;
                    released = true;
                    this.#release();
                });
            };

            if (this.#locked) {
                this.#waiters.push(grant);
            } else {
                grant();
            }
        });
    }

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }

    #release(): void {
        const next = this.#waiters.shift();
        if (next) {
            next();
        } else {
            this.#locked = false;
        }
    }
}
