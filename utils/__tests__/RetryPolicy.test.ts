import { describe, it, expect, vi } from 'vitest';
import {
    RetryPolicy,
    backoffDelayMs,
    executeWithRetry,
    jitteredDelayMs,
    nextAttemptState,
} from '../RetryPolicy';

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000, jitterMs: 250 };

class TestError extends Error {
    constructor(public readonly transient: boolean) {
        super(transient ? 'flaky' : 'broken');
    }
}

const toError = (thrown: unknown): TestError =>
    thrown instanceof TestError ? thrown : new TestError(false);

describe('backoff', () => {
    it('doubles per attempt and caps at maxDelayMs', () => {
        expect([1, 2, 3, 4, 5].map(a => backoffDelayMs(a, policy))).toEqual([1000, 2000, 4000, 8000, 8000]);
    });

    it('adds bounded jitter without exceeding the cap', () => {
        expect(jitteredDelayMs(1, policy, () => 0.5)).toBe(1125);
        expect(jitteredDelayMs(4, policy, () => 0.99)).toBe(8000);
    });

    it('is non-decreasing in the attempt number', () => {
        const delays = Array.from({ length: 10 }, (_, i) => backoffDelayMs(i + 1, policy));
        for (let i = 1; i < delays.length; i++) {
            expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1]);
        }
    });
});

describe('nextAttemptState', () => {
    it('moves a transient failure to waiting while attempts remain', () => {
        const error = new TestError(true);
        expect(nextAttemptState({ phase: 'failedTransient', attempt: 1, error }, policy, () => 0)).toEqual({
            phase: 'waiting',
            attempt: 2,
            delayMs: 1000,
            lastError: error,
        });
    });

    it('ends after the last attempt', () => {
        const error = new TestError(true);
        expect(nextAttemptState({ phase: 'failedTransient', attempt: 3, error }, policy)).toBeNull();
        expect(nextAttemptState({ phase: 'failedTerminal', attempt: 1, error }, policy)).toBeNull();
    });
});

describe('executeWithRetry', () => {
    it('succeeds after N-1 transient failures with growing waits', async () => {
        const sleeps: number[] = [];
        const onAttempt = vi.fn();
        const operation = vi.fn()
            .mockRejectedValueOnce(new TestError(true))
            .mockRejectedValueOnce(new TestError(true))
            .mockResolvedValueOnce('ok');

        const result = await executeWithRetry<string, TestError>(operation, {
            policy,
            isTransient: e => e.transient,
            toError,
            sleep: async ms => { sleeps.push(ms); },
            random: () => 0,
            onAttempt,
        });

        expect(result).toEqual({ ok: true, value: 'ok', attempts: 3 });
        expect(sleeps).toEqual([1000, 2000]);
        expect(onAttempt.mock.calls).toEqual([[2, 3], [3, 3]]);
    });

    it('does not retry a terminal failure', async () => {
        const operation = vi.fn().mockRejectedValue(new TestError(false));
        const sleep = vi.fn(async () => undefined);

        const result = await executeWithRetry<string, TestError>(operation, {
            policy, isTransient: e => e.transient, toError, sleep,
        });

        expect(result).toMatchObject({ ok: false, attempts: 1, exhausted: false });
        expect(operation).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it('reports exhaustion after maxAttempts transient failures', async () => {
        const operation = vi.fn().mockRejectedValue(new TestError(true));

        const result = await executeWithRetry<string, TestError>(operation, {
            policy, isTransient: e => e.transient, toError, sleep: async () => undefined, random: () => 0,
        });

        expect(result).toMatchObject({ ok: false, attempts: 3, exhausted: true });
        expect(operation).toHaveBeenCalledTimes(3);
    });

    it('maps unknown throws through toError', async () => {
        const result = await executeWithRetry<string, TestError>(async () => { throw 'boom'; }, {
            policy, isTransient: e => e.transient, toError, sleep: async () => undefined,
        });

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message).toBe('broken');
    });
});
