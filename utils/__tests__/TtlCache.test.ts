import { describe, it, expect } from 'vitest';
import TtlCache from '../TtlCache';

const clock = () => {
    let t = 1000;
    return { now: () => t, advance: (ms: number) => { t += ms; } };
};

describe('TtlCache', () => {
    it('returns a value until its TTL has elapsed', () => {
        const c = clock();
        const cache = new TtlCache<string>({ ttlMs: 100, now: c.now });

        cache.set('a', 'alpha');
        c.advance(99);
        expect(cache.get('a')).toBe('alpha');

        c.advance(1);
        expect(cache.get('a')).toBeUndefined();
        expect(cache.size).toBe(0);
    });

    it('measures expiry from the latest insertion', () => {
        const c = clock();
        const cache = new TtlCache<number>({ ttlMs: 100, now: c.now });

        cache.set('k', 1);
        c.advance(80);
        cache.set('k', 2);
        c.advance(80);

        expect(cache.get('k')).toBe(2);
    });

    it('evicts the oldest insertion when full', () => {
        const cache = new TtlCache<number>({ ttlMs: 1000, maxEntries: 2 });
        cache.set('a', 1);
        cache.set('b', 2);
        cache.set('c', 3);

        expect(cache.has('a')).toBe(false);
        expect(cache.get('b')).toBe(2);
        expect(cache.get('c')).toBe(3);
        expect(cache.size).toBe(2);
    });

    it('clear() drops every entry', () => {
        const cache = new TtlCache<number>({ ttlMs: 1000 });
        cache.set('a', 1);
        cache.set('b', 2);
        cache.clear();
        expect(cache.size).toBe(0);
        expect(cache.get('a')).toBeUndefined();
    });

    it('rejects a non-positive TTL', () => {
        expect(() => new TtlCache({ ttlMs: 0 })).toThrow(RangeError);
    });
});
