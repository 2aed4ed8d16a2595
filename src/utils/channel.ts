interface PendingSend<T> {
    value: T;
    settle: (delivered: boolean) => void;
}

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Zero-capacity handoff between one producer and one consumer.
 *
 * `send` resolves only once a receiver has taken the value, so a slow consumer
 * stalls the producer. Nothing is ever buffered beyond the values whose senders
 * are still waiting.
 */
export class Channel<T> implements AsyncIterable<T> {
    readonly #senders: PendingSend<T>[] = [];
    readonly #receivers: PendingReceive<T>[] = [];
    #closed = false;

    get closed(): boolean {
        return this.#closed;
    }

    /**
     * Hand `value` to a receiver.
     * Resolves `true` once received, `false` if the channel closed or `signal`
     * aborted before anyone took it.
     */
    send(value: T, signal?: AbortSignal): Promise<boolean> {
        if (this.#closed || signal?.aborted) {
            return Promise.resolve(false);
        }

        const receiver = this.#receivers.shift();
        if (receiver) {
            receiver({ value, done: false });
            return Promise.resolve(true);
        }

        return new Promise<boolean>((resolve) => {
            const pending: PendingSend<T> = {
                value,
                settle: (delivered) => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(delivered);
                },
            };
            const onAbort = (): void => {
                const index = this.#senders.indexOf(pending);
                if (index !== -1) {
                    this.#senders.splice(index, 1);
                    pending.settle(false);
                }
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.#senders.push(pending);
        });
    }

    /** Next value, or `undefined` once the channel is closed. */
    async receive(): Promise<T | undefined> {
        const result = await this.next();
        return result.done ? undefined : result.value;
    }

    next(): Promise<IteratorResult<T, undefined>> {
        const sender = this.#senders.shift();
        if (sender) {
            sender.settle(true);
            return Promise.resolve({ value: sender.value, done: false });
        }
        if (this.#closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
            this.#receivers.push(resolve);
        });
    }

    /** Release every waiting sender (`false`) and receiver (done). Idempotent. */
    close(): void {
        if (this.#closed) return;
        this.#closed = true;

        for (const sender of this.#senders.splice(0)) {
            sender.settle(false);
        }
        for (const receiver of this.#receivers.splice(0)) {
            receiver({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next(),
        };
    }
}
