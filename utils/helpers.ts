// utils/helpers.ts
import { ONE_DAY_MS, type DatePeriod } from './constants';

// 1. Pause execution for X milliseconds. Resolves early (never rejects) when the signal aborts.
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>(resolve => {
        if (signal?.aborted) return resolve();

        const finish = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', finish);
            resolve();
        };
        const timer = setTimeout(finish, Math.max(0, ms));
        signal?.addEventListener('abort', finish, { once: true });
    });

// 2. ISO calendar dates (YYYY-MM-DD, UTC)
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a YYYY-MM-DD string into epoch millis (UTC midnight).
 * Returns null for malformed strings and impossible dates such as 2025-02-30.
 */
export const parseIsoDate = (value: string): number | null => {
    const match = ISO_DATE.exec(value);
    if (!match) return null;

    const [, y, m, d] = match;
    const ms = Date.UTC(Number(y), Number(m) - 1, Number(d));
    return toIsoDate(ms) === value ? ms : null;
};

export const isIsoDate = (value: string): boolean => parseIsoDate(value) !== null;

export const toIsoDate = (ms: number): string => new Date(ms).toISOString().slice(0, 10);

export const todayIso = (now: number = Date.now()): string => toIsoDate(now);

const requireIsoDate = (value: string): number => {
    const ms = parseIsoDate(value);
    if (ms === null) throw new RangeError(`Invalid ISO date: "${value}"`);
    return ms;
};

export const addDays = (date: string, days: number): string =>
    toIsoDate(requireIsoDate(date) + days * ONE_DAY_MS);

// Whole days from start to end (negative when end precedes start)
export const daysBetween = (startDate: string, endDate: string): number =>
    Math.round((requireIsoDate(endDate) - requireIsoDate(startDate)) / ONE_DAY_MS);

// 3. Preset lookback periods (dashboard "Time Range")
const PERIOD_DAYS: Record<Exclude<DatePeriod, 'custom'>, number> = {
    '30d': 30,
    '90d': 90,
    '180d': 180,
    '365d': 365,
};

const DEFAULT_PERIOD_DAYS = 180;

export const getDateRangeForPeriod = (
    period: DatePeriod,
    endDate: string
): { startDate: string; endDate: string } => {
    const days = period === 'custom' ? DEFAULT_PERIOD_DAYS : PERIOD_DAYS[period];
    return { startDate: addDays(endDate, -days), endDate };
};

// 4. Order-preserving de-duplication
export const uniqueInOrder = <T>(values: readonly T[]): T[] => Array.from(new Set(values));

// 5. Error message extraction for logs and failure values
export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
