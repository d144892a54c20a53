export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep,
};

/**
 * Spaces requests out by a minimum gap measured from the end of the previous
 * request to the start of the next, so slow responses never add extra delay.
 */
export class Throttle {
    private lastCallEnd: number | null = null;
    private readonly minIntervalMs: number;
    private readonly clock: Clock;

    constructor(minIntervalMs: number, clock: Clock = systemClock) {
        this.minIntervalMs = minIntervalMs;
        this.clock = clock;
    }

    // Returns how long it waited.
    async waitForSlot(): Promise<number> {
        if (this.lastCallEnd === null) return 0;

        const sinceLastCall = this.clock.now() - this.lastCallEnd;
        const waitTime = Math.max(0, this.minIntervalMs - sinceLastCall);
        if (waitTime > 0) {
            await this.clock.sleep(waitTime);
        }
        return waitTime;
    }

    release(): void {
        this.lastCallEnd = this.clock.now();
    }

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        await this.waitForSlot();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}
