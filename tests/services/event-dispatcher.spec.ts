import { describe, expect, it } from 'vitest';
import { EventDispatcher } from '../../src/services/event-dispatcher.js';
import { Channel } from '../../src/utils/channel.js';
import type { DispatchPolicy, FileMetadata, Operation, WatchEvent } from '../../src/types/watcher.js';

const info: FileMetadata = { name: 'f', size: 1, mode: 0o644, modTime: 1, isDirectory: false, handle: null };

function event(op: Operation, path: string): WatchEvent {
    return { op, path, metadata: info };
}

function policy(operations: Operation[] = [], maxEvents = 0): DispatchPolicy {
    return { operations: new Set(operations), maxEvents };
}

function setup() {
    const events = new Channel<WatchEvent>();
    const errors = new Channel<Error>();
    return { events, errors, dispatcher: new EventDispatcher(events, errors) };
}

describe('EventDispatcher', () => {
    it('hands events to the consumer in order', async () => {
        const { events, dispatcher } = setup();
        const batch = [event('write', '/w/a'), event('create', '/w/b')];

        const delivery = dispatcher.dispatchCycle(batch, policy(), new AbortController().signal);
        const first = await events.receive();
        const second = await events.receive();

        expect(first?.path).toBe('/w/a');
        expect(second?.path).toBe('/w/b');
        expect(await delivery).toEqual({ delivered: 2, filtered: 0, truncated: 0, aborted: false });
    });

    it('drops the rest of the cycle once the cap is exceeded', async () => {
        const { events, dispatcher } = setup();
        const batch = [event('write', '/w/a'), event('create', '/w/b'), event('remove', '/w/c')];

        const delivery = dispatcher.dispatchCycle(batch, policy([], 1), new AbortController().signal);
        const received = await events.receive();

        expect(received?.path).toBe('/w/a');
        expect(await delivery).toEqual({ delivered: 1, filtered: 0, truncated: 2, aborted: false });
    });

    it('does not count filtered events toward the cap', async () => {
        const { events, dispatcher } = setup();
        const batch = [event('create', '/w/x'), event('write', '/w/a'), event('chmod', '/w/y'), event('write', '/w/b')];

        const delivery = dispatcher.dispatchCycle(batch, policy(['write'], 2), new AbortController().signal);
        const paths = [(await events.receive())?.path, (await events.receive())?.path];

        expect(paths).toEqual(['/w/a', '/w/b']);
        expect(await delivery).toEqual({ delivered: 2, filtered: 2, truncated: 0, aborted: false });
    });

    it('counts only events that pass the filter as truncated', async () => {
        const { events, dispatcher } = setup();
        const batch = [event('write', '/w/a'), event('write', '/w/b'), event('create', '/w/x'), event('write', '/w/c')];

        const delivery = dispatcher.dispatchCycle(batch, policy(['write'], 1), new AbortController().signal);
        const received = await events.receive();

        expect(received?.path).toBe('/w/a');
        expect(await delivery).toEqual({ delivered: 1, filtered: 1, truncated: 2, aborted: false });
    });

    it('stops delivering when the signal aborts mid-cycle', async () => {
        const { dispatcher } = setup();
        const controller = new AbortController();

        const delivery = dispatcher.dispatchCycle([event('write', '/w/a')], policy(), controller.signal);
        controller.abort();

        expect(await delivery).toEqual({ delivered: 0, filtered: 0, truncated: 0, aborted: true });
    });

    it('routes errors to the error channel', async () => {
        const { errors, dispatcher } = setup();
        const failure = new Error('boom');

        const sent = dispatcher.reportError(failure, new AbortController().signal);

        expect(await errors.receive()).toBe(failure);
        expect(await sent).toBe(true);
    });
});
