// utils/TtlCache.ts

interface ICacheEntry<V> {
    value: V;
    insertedAt: number;
}

export interface TtlCacheOptions {
    ttlMs: number;
    maxEntries?: number;
    now?: () => number;
}

/**
 * In-memory cache with a fixed time-to-live measured from insertion.
 * Expiry is checked on read; there is no background sweeper.
 * Entries are replaced whole, so a reader sees either a complete value or nothing.
 */
class TtlCache<V> {
    private readonly entries = new Map<string, ICacheEntry<V>>();
    private readonly ttlMs: number;
    private readonly maxEntries: number;
    private readonly now: () => number;

    constructor({ ttlMs, maxEntries = Number.POSITIVE_INFINITY, now = Date.now }: TtlCacheOptions) {
        if (!(ttlMs > 0)) throw new RangeError(`TTL must be positive, got ${ttlMs}`);
        if (!(maxEntries >= 1)) throw new RangeError(`maxEntries must be at least 1, got ${maxEntries}`);
        this.ttlMs = ttlMs;
        this.maxEntries = maxEntries;
        this.now = now;
    }

    get(key: string): V | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;

        if (this.isExpired(entry)) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    has(key: string): boolean {
        return this.get(key) !== undefined;
    }

    set(key: string, value: V): void {
        // Re-inserting moves the key to the back of the eviction order
        this.entries.delete(key);

        while (this.entries.size >= this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }

        this.entries.set(key, { value, insertedAt: this.now() });
    }

    clear(): void {
        this.entries.clear();
    }

    // Live entries only
    get size(): number {
        let count = 0;
        for (const [key, entry] of this.entries) {
            if (this.isExpired(entry)) this.entries.delete(key);
            else count++;
        }
        return count;
    }

    private isExpired(entry: ICacheEntry<V>): boolean {
        return this.now() - entry.insertedAt >= this.ttlMs;
    }
}

export default TtlCache;
