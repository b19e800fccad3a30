// utils/RequestPacer.ts
import { sleep as defaultSleep } from './helpers';

export interface RequestPacerOptions {
    minIntervalMs: number;
    now?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Enforces a minimum gap between the starts of consecutive calls to one backend.
 * Slots are reserved synchronously, so callers sharing a pacer are spaced out
 * even when they ask for a turn at the same time.
 */
class RequestPacer {
    private readonly minIntervalMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
    private nextSlotAt = Number.NEGATIVE_INFINITY;

    constructor({ minIntervalMs, now = Date.now, sleep = defaultSleep }: RequestPacerOptions) {
        if (!(minIntervalMs >= 0)) throw new RangeError(`minIntervalMs must be >= 0, got ${minIntervalMs}`);
        this.minIntervalMs = minIntervalMs;
        this.now = now;
        this.sleep = sleep;
    }

    /**
     * Waits until the caller may start its request.
     * Resolves false if the signal aborted before the slot came up.
     */
    async waitTurn(signal?: AbortSignal): Promise<boolean> {
        if (signal?.aborted) return false;

        const current = this.now();
        const slot = Math.max(current, this.nextSlotAt);
        this.nextSlotAt = slot + this.minIntervalMs;

        const waitMs = slot - current;
        if (waitMs > 0) await this.sleep(waitMs, signal);

        return !signal?.aborted;
    }
}

export default RequestPacer;
