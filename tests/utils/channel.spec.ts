import { describe, expect, it } from 'vitest';
import { Channel } from '../../src/utils/channel.js';

describe('Channel', () => {
    it('resolves the sender only once a receiver takes the value', async () => {
        const channel = new Channel<number>();
        let delivered = false;

        const sending = channel.send(1).then((result) => {
            delivered = result;
        });
        await Promise.resolve();
        expect(delivered).toBe(false);

        expect(await channel.receive()).toBe(1);
        await sending;
        expect(delivered).toBe(true);
    });

    it('hands a value straight to a receiver that is already waiting', async () => {
        const channel = new Channel<string>();

        const receiving = channel.receive();
        expect(await channel.send('x')).toBe(true);
        expect(await receiving).toBe('x');
    });

    it('withdraws a pending value when the signal aborts', async () => {
        const channel = new Channel<number>();
        const controller = new AbortController();

        const sending = channel.send(7, controller.signal);
        controller.abort();
        expect(await sending).toBe(false);

        const next = channel.receive();
        expect(await channel.send(8)).toBe(true);
        expect(await next).toBe(8);
    });

    it('refuses sends after close and releases waiters', async () => {
        const channel = new Channel<number>();
        const waitingSender = channel.send(1);
        channel.close();

        expect(await waitingSender).toBe(false);
        expect(await channel.send(2)).toBe(false);
        expect(await channel.receive()).toBeUndefined();
        expect(channel.closed).toBe(true);
    });

    it('ends async iteration when closed', async () => {
        const channel = new Channel<number>();
        const seen: number[] = [];

        const consuming = (async () => {
            for await (const value of channel) seen.push(value);
        })();

        await channel.send(1);
        await channel.send(2);
        channel.close();
        await consuming;

        expect(seen).toEqual([1, 2]);
    });
});
