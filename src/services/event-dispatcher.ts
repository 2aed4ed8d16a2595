import { logThought } from '../utils/logger.js';
import type { Channel } from '../utils/channel.js';
import type { DispatchPolicy, WatchEvent } from '../types/watcher.js';

/** What happened to one cycle's events. */
export interface DeliveryOutcome {
    delivered: number;
    /** Dropped by the operation filter. */
    filtered: number;
    /** Dropped because the per-cycle cap was reached. */
    truncated: number;
    /** Delivery stopped because the watcher closed. */
    aborted: boolean;
}

/**
 * Gates a cycle's events through the operation filter and per-cycle cap, then
 * hands each survivor to the public event channel, waiting for the consumer.
 */
export class EventDispatcher {
    readonly #events: Channel<WatchEvent>;
    readonly #errors: Channel<Error>;

    constructor(events: Channel<WatchEvent>, errors: Channel<Error>) {
        this.#events = events;
        this.#errors = errors;
    }

    async dispatchCycle(
        events: readonly WatchEvent[],
        policy: DispatchPolicy,
        signal: AbortSignal,
    ): Promise<DeliveryOutcome> {
        const outcome: DeliveryOutcome = { delivered: 0, filtered: 0, truncated: 0, aborted: false };
        let counted = 0;

        const passes = (event: WatchEvent): boolean =>
            policy.operations.size === 0 || policy.operations.has(event.op);

        for (let index = 0; index < events.length; index++) {
            const event = events[index];

            if (!passes(event)) {
                outcome.filtered++;
                continue;
            }

            counted++;
            if (policy.maxEvents > 0 && counted > policy.maxEvents) {
                const remaining = events.slice(index);
                outcome.truncated = remaining.filter(passes).length;
                outcome.filtered += remaining.length - outcome.truncated;
                void logThought(
                    `[EventDispatcher] Cycle cap of ${policy.maxEvents} reached; dropped ${outcome.truncated} remaining event(s).`,
                );
                break;
            }

            if (!(await this.#events.send(event, signal))) {
                outcome.aborted = true;
                break;
            }
            outcome.delivered++;
        }

        return outcome;
    }

    /** Resolves `false` if the watcher closed before the error was received. */
    reportError(error: Error, signal: AbortSignal): Promise<boolean> {
        return this.#errors.send(error, signal);
    }

    /** Publish an event outside the poll cycle, bypassing filter and cap. */
    publish(event: WatchEvent, signal: AbortSignal): Promise<boolean> {
        return this.#events.send(event, signal);
    }
}
