// utils/RetryPolicy.ts
import { CONSTANTS } from './constants';

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: CONSTANTS.RETRY.MAX_ATTEMPTS,
    baseDelayMs: CONSTANTS.RETRY.BASE_DELAY_MS,
    maxDelayMs: CONSTANTS.RETRY.MAX_DELAY_MS,
    jitterMs: CONSTANTS.RETRY.JITTER_MS,
};

/**
 * Backoff before the retry that follows failed attempt `attempt` (1-based), without jitter:
 * base * 2^(attempt - 1), capped at maxDelayMs.
 */
export const backoffDelayMs = (attempt: number, policy: RetryPolicy): number => {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
};

// `random` must return a value in [0, 1)
export const jitteredDelayMs = (attempt: number, policy: RetryPolicy, random: () => number = Math.random): number => {
    const jitter = Math.floor(random() * policy.jitterMs);
    return Math.min(policy.maxDelayMs, backoffDelayMs(attempt, policy) + jitter);
};

// --- Attempt State Machine ---
// pending -> succeeded | failedTransient | failedTerminal
// failedTransient -> waiting -> pending (while attempts remain)

export type AttemptState<T, E> =
    | { phase: 'pending'; attempt: number }
    | { phase: 'waiting'; attempt: number; delayMs: number; lastError: E }
    | { phase: 'succeeded'; attempt: number; value: T }
    | { phase: 'failedTransient'; attempt: number; error: E }
    | { phase: 'failedTerminal'; attempt: number; error: E };

export type RetryResult<T, E> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: E; attempts: number; exhausted: boolean };

export interface RetryOptions<E> {
    policy: RetryPolicy;
    // Decides whether a failure may be retried
    isTransient: (error: E) => boolean;
    // Maps whatever the operation threw into the caller's error type
    toError: (thrown: unknown) => E;
    sleep: (ms: number) => Promise<void>;
    random?: () => number;
    onAttempt?: (attempt: number, maxAttempts: number) => void;
    onRetry?: (attempt: number, delayMs: number, error: E) => void;
}

/**
 * Pure transition out of a failed or waiting state.
 * Returns null when the state is final.
 */
export const nextAttemptState = <T, E>(
    state: AttemptState<T, E>,
    policy: RetryPolicy,
    random: () => number = Math.random
): AttemptState<T, E> | null => {
    switch (state.phase) {
        case 'failedTransient':
            if (state.attempt >= policy.maxAttempts) return null;
            return {
                phase: 'waiting',
                attempt: state.attempt + 1,
                delayMs: jitteredDelayMs(state.attempt, policy, random),
                lastError: state.error,
            };
        case 'waiting':
            return { phase: 'pending', attempt: state.attempt };
        case 'pending':
        case 'succeeded':
        case 'failedTerminal':
            return null;
    }
};

/**
 * Runs `operation` until it succeeds, fails terminally, or runs out of attempts.
 * Never throws: failures come back as values carrying the attempt count.
 */
export const executeWithRetry = async <T, E>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions<E>
): Promise<RetryResult<T, E>> => {
    const { policy, isTransient, toError, sleep, random = Math.random, onAttempt, onRetry } = options;
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let state: AttemptState<T, E> = { phase: 'pending', attempt: 1 };

    // eslint-disable-next-line no-constant-condition
    while (true) {
        switch (state.phase) {
            case 'pending': {
                if (state.attempt > 1) onAttempt?.(state.attempt, maxAttempts);
                try {
                    const value = await operation(state.attempt);
                    state = { phase: 'succeeded', attempt: state.attempt, value };
                } catch (thrown) {
                    const error = toError(thrown);
                    state = isTransient(error)
                        ? { phase: 'failedTransient', attempt: state.attempt, error }
                        : { phase: 'failedTerminal', attempt: state.attempt, error };
                }
                break;
            }
            case 'waiting':
                onRetry?.(state.attempt, state.delayMs, state.lastError);
                await sleep(state.delayMs);
                state = { phase: 'pending', attempt: state.attempt };
                break;
            case 'succeeded':
                return { ok: true, value: state.value, attempts: state.attempt };
            case 'failedTerminal':
                return { ok: false, error: state.error, attempts: state.attempt, exhausted: false };
            case 'failedTransient': {
                const next: AttemptState<T, E> | null = nextAttemptState<T, E>(state, { ...policy, maxAttempts }, random);
                if (!next) return { ok: false, error: state.error, attempts: state.attempt, exhausted: true };
                state = next;
                break;
            }
        }
    }
};
