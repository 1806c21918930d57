/**
 * Bounded LRU + TTL cache with single-flight computation.
 *
 * Every insertion (set or a finished getOrCompute) goes through commit(),
 * which is the only place capacity is enforced.
 */

import { waitWithSignal } from "../../utils/async";
import { createLogger, Logger } from "../../utils/logger";

export interface CacheEntry<V> {
    value: V;
    insertedAt: number;
    lastAccessedAt: number;
    expiresAt?: number;
}

export type CacheLookup<V> = { found: true; value: V } | { found: false };

export interface CacheStatistics {
    size: number;
    maxSize: number;
    hits: number;
    misses: number;
    evictions: number;
    /** Percentage of lookups served from the cache, 0-100 */
    hitRate: number;
    /** Rough bytes estimate for dashboards, not a measurement */
    approxMemory: number;
}

export interface BoundedCacheOptions {
    maxSize: number;
    /** Applied when set/getOrCompute get no TTL. Omit for no expiry. */
    defaultTtlMs?: number;
    /** Background sweep period; 0 disables the timer */
    sweepIntervalMs?: number;
    now?: () => number;
    logger?: Logger;
}

export interface GetOrComputeOptions {
    ttlMs?: number;
    /** Aborts this caller's wait only */
    signal?: AbortSignal;
}

interface InFlight<V> {
    promise: Promise<V>;
}

const ENTRY_OVERHEAD_BYTES = 32 + 1024 + 48;
const BASE_OVERHEAD_BYTES = 1024;

export class BoundedCache<K, V> {
    private readonly entries = new Map<K, CacheEntry<V>>();
    private readonly inFlight = new Map<K, InFlight<V>>();
    private readonly maxSize: number;
    private readonly defaultTtlMs?: number;
    private readonly now: () => number;
    private readonly log: Logger;
    private sweepTimer: NodeJS.Timeout | null = null;
    private hits = 0;
    private misses = 0;
    private evictions = 0;

    constructor(options: BoundedCacheOptions) {
        if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
            throw new RangeError("maxSize must be a positive integer");
        }
        this.maxSize = options.maxSize;
        this.defaultTtlMs = options.defaultTtlMs;
        this.now = options.now ?? Date.now;
        this.log = options.logger ?? createLogger("cache");

        const sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
        if (sweepIntervalMs > 0) {
            this.sweepTimer = setInterval(() => {
                this.cleanupExpired();
            }, sweepIntervalMs);
            this.sweepTimer.unref();
        }
    }

    get(key: K): CacheLookup<V> {
        const entry = this.liveEntry(key);
        if (!entry) {
            this.misses++;
            return { found: false };
        }
        this.hits++;
        this.touch(key, entry);
        return { found: true, value: entry.value };
    }

    set(key: K, value: V, ttlMs?: number): void {
        this.commit(key, value, ttlMs);
    }

    /**
     * Returns the cached value or runs `factory` once for all concurrent
     * callers of the same key. A failed factory caches nothing; the next
     * caller retries.
     */
    async getOrCompute(
        key: K,
        factory: (key: K) => Promise<V>,
        options: GetOrComputeOptions = {}
    ): Promise<V> {
        const entry = this.liveEntry(key);
        if (entry) {
            this.hits++;
            this.touch(key, entry);
            return entry.value;
        }

        const pending = this.inFlight.get(key);
        if (pending) {
            this.hits++;
            return waitWithSignal(pending.promise, options.signal, "cache wait");
        }

        this.misses++;
        const flight: InFlight<V> = {
            promise: Promise.resolve().then(() => factory(key)),
        };
        this.inFlight.set(key, flight);

        flight.promise.then(
            (value) => {
                // remove()/clear() during the computation drop the token
                if (this.inFlight.get(key) === flight) {
                    this.inFlight.delete(key);
                    this.commit(key, value, options.ttlMs);
                }
            },
            (error: unknown) => {
                if (this.inFlight.get(key) === flight) {
                    this.inFlight.delete(key);
                }
                this.log.debug("Cache factory failed; nothing stored", { error });
            }
        );

        return waitWithSignal(flight.promise, options.signal, "cache compute");
    }

    remove(key: K): boolean {
        this.inFlight.delete(key);
        return this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
        this.inFlight.clear();
    }

    /**
     * Drops every expired entry. Returns how many were removed.
     */
    cleanupExpired(): number {
        const now = this.now();
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (isExpired(entry, now)) {
                this.entries.delete(key);
                removed++;
            }
        }
        if (removed > 0) {
            this.log.debug(`Swept ${removed} expired entries`, {
                size: this.entries.size,
            });
        }
        return removed;
    }

    statistics(): CacheStatistics {
        const lookups = this.hits + this.misses;
        return {
            size: this.entries.size,
            maxSize: this.maxSize,
            hits: this.hits,
            misses: this.misses,
            evictions: this.evictions,
            hitRate: lookups === 0 ? 0 : (this.hits / lookups) * 100,
            approxMemory:
                BASE_OVERHEAD_BYTES + this.entries.size * ENTRY_OVERHEAD_BYTES,
        };
    }

    get size(): number {
        return this.entries.size;
    }

    dispose(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }

    private commit(key: K, value: V, ttlMs?: number): void {
        const now = this.now();
        const ttl = ttlMs ?? this.defaultTtlMs;
        const existing = this.entries.get(key);

        // Re-inserting moves the key to the most-recent end of the map.
        this.entries.delete(key);
        this.entries.set(key, {
            value,
            insertedAt: existing?.insertedAt ?? now,
            lastAccessedAt: now,
            expiresAt: ttl === undefined ? undefined : now + ttl,
        });

        this.evictOverflow();
    }

    private evictOverflow(): void {
        // Map iteration order is ascending last access.
        for (const key of this.entries.keys()) {
            if (this.entries.size <= this.maxSize) {
                return;
            }
            this.entries.delete(key);
            this.evictions++;
        }
    }

    private liveEntry(key: K): CacheEntry<V> | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }
        if (isExpired(entry, this.now())) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    private touch(key: K, entry: CacheEntry<V>): void {
        entry.lastAccessedAt = this.now();
        this.entries.delete(key);
        this.entries.set(key, entry);
    }
}

function isExpired<V>(entry: CacheEntry<V>, now: number): boolean {
    return entry.expiresAt !== undefined && now >= entry.expiresAt;
}
