import { describe, expect, it } from 'vitest';

import { type GateClock, RequestGate } from '../gate.js';

/** Clock whose sleeps advance time instantly and are recorded. */
const fakeClock = (): GateClock & { sleeps: number[]; advance: (ms: number) => void } => {
    let time = 0;
    const sleeps: number[] = [];
    return {
        sleeps,
        now: () => time,
        sleep: async (ms) => {
            sleeps.push(ms);
            time += ms;
        },
        advance: (ms) => {
            time += ms;
        },
    };
};

describe('RequestGate', () => {
    it('should run the first task without waiting', async () => {
        const clock = fakeClock();
        const gate = new RequestGate(2000, clock);

        await expect(gate.run(async () => 'ok')).resolves.toBe('ok');
        expect(clock.sleeps).toEqual([]);
    });

    it('should wait the full delay after the previous task finished', async () => {
        const clock = fakeClock();
        const gate = new RequestGate(2000, clock);

        await gate.run(async () => undefined);
        await gate.run(async () => undefined);

        expect(clock.sleeps).toEqual([2000]);
    });

    it('should only wait for the remainder of the delay', async () => {
        const clock = fakeClock();
        const gate = new RequestGate(2000, clock);

        await gate.run(async () => undefined);
        clock.advance(1500);
        await gate.run(async () => undefined);

        expect(clock.sleeps).toEqual([500]);
    });

    it('should not wait when the delay already passed', async () => {
        const clock = fakeClock();
        const gate = new RequestGate(2000, clock);

        await gate.run(async () => undefined);
        clock.advance(5000);
        await gate.run(async () => undefined);

        expect(clock.sleeps).toEqual([]);
    });

    it('should serialize concurrent callers in call order', async () => {
        const clock = fakeClock();
        const gate = new RequestGate(2000, clock);
        const events: string[] = [];

        const task = (name: string) => async () => {
            events.push(`${name}:start`);
            await Promise.resolve();
            events.push(`${name}:end`);
            return name;
        };

        const results = await Promise.all([gate.run(task('a')), gate.run(task('b')), gate.run(task('c'))]);

        expect(results).toEqual(['a', 'b', 'c']);
        expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
        expect(clock.sleeps).toEqual([2000, 2000]);
    });

    it('should release the gate when a task fails', async () => {
        const clock = fakeClock();
        const gate = new RequestGate(2000, clock);

        await expect(
            gate.run(async () => {
                throw new Error('boom');
            }),
        ).rejects.toThrow('boom');
        await expect(gate.run(async () => 'next')).resolves.toBe('next');

        expect(clock.sleeps).toEqual([2000]);
    });

    it('should never sleep with a zero delay', async () => {
        const clock = fakeClock();
        const gate = new RequestGate(0, clock);

        await Promise.all([gate.run(async () => 1), gate.run(async () => 2)]);

        expect(clock.sleeps).toEqual([]);
    });
});
