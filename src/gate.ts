import { setTimeout } from 'node:timers/promises';

export interface GateClock {
    now: () => number;
    sleep: (ms: number) => Promise<void>;
}

const systemClock: GateClock = {
    now: () => Date.now(),
    sleep: async (ms) => {
        await setTimeout(ms);
    },
};

/**
 * Process-wide request throttle. Tasks run one at a time in call order, and each starts no sooner than
 * `minDelayMs` after the previous one finished, whichever category or worker it came from.
 */
export class RequestGate {
    private tail: Promise<void> = Promise.resolve();
    private lastFinishedAt: number | null = null;

    constructor(
        readonly minDelayMs: number,
        private readonly clock: GateClock = systemClock,
    ) {}

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(async () => {
            await this.waitForSlot();
            try {
                return await task();
            } finally {
                this.lastFinishedAt = this.clock.now();
            }
        });
        this.tail = result.then(
            () => undefined,
            () => undefined,
        );
        return result;
    }

    private async waitForSlot(): Promise<void> {
        if (this.lastFinishedAt === null) return;
        const wait = this.lastFinishedAt + this.minDelayMs - this.clock.now();
        if (wait > 0) await this.clock.sleep(wait);
    }
}
