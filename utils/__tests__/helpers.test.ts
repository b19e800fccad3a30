import { describe, it, expect } from 'vitest';
import {
    addDays,
    daysBetween,
    getDateRangeForPeriod,
    isIsoDate,
    parseIsoDate,
    sleep,
    uniqueInOrder,
} from '../helpers';

describe('ISO dates', () => {
    it('rejects malformed and impossible dates', () => {
        expect(isIsoDate('2025-02-28')).toBe(true);
        expect(parseIsoDate('2025-02-30')).toBeNull();
        expect(parseIsoDate('2025-2-3')).toBeNull();
        expect(parseIsoDate('not a date')).toBeNull();
    });

    it('adds days across month and year boundaries', () => {
        expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
        expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    });

    it('counts whole days between dates', () => {
        expect(daysBetween('2024-09-01', '2024-09-11')).toBe(10);
        expect(daysBetween('2024-09-11', '2024-09-01')).toBe(-10);
        expect(() => daysBetween('2024-09-31', '2024-10-01')).toThrow(RangeError);
    });
});

describe('getDateRangeForPeriod', () => {
    it('counts back from the end date', () => {
        expect(getDateRangeForPeriod('30d', '2025-03-31')).toEqual({ startDate: '2025-03-01', endDate: '2025-03-31' });
    });

    it('defaults custom to 180 days', () => {
        expect(getDateRangeForPeriod('custom', '2025-03-31').startDate).toBe('2024-10-02');
    });
});

describe('sleep', () => {
    it('resolves at once when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const started = Date.now();
        await sleep(60_000, controller.signal);
        expect(Date.now() - started).toBeLessThan(1000);
    });
});

describe('uniqueInOrder', () => {
    it('keeps the first occurrence', () => {
        expect(uniqueInOrder(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
    });
});
