import { Counter, Gauge } from 'prom-client'

import { logger } from './logger'

const ttlCacheLookups = new Counter({
    name: 'ttl_cache_lookups_total',
    help: 'The number of cache lookups, by whether they were served from the cache',
    labelNames: ['name', 'hit'],
})

const ttlCacheSize = new Gauge({
    name: 'ttl_cache_size',
    help: 'Current number of entries in the cache',
    labelNames: ['name'],
})

export type TtlCacheOptions = {
    name: string
    /** How long a loaded value is served before it is loaded again */
    ttlMs: number
    /** Maximum number of entries in the cache - LRU eviction when exceeded */
    maxSize: number
}

type TtlCacheEntry<T> = {
    value: T
    expiresAt: number
    lastUsed: number
}

/**
 * Keyed cache with a fixed time to live.
 *
 * - `get` returns the cached value while it is fresh, otherwise calls the loader and caches the result
 * - Concurrent `get`s for the same key share one load
 * - Failed loads are not cached, the next `get` tries again
 * - Entries beyond `maxSize` are dropped least recently used first
 */
export class TtlCache<T> {
    private entries = new Map<string, TtlCacheEntry<T>>()
    private pendingLoads = new Map<string, Promise<T>>()

    constructor(private readonly options: TtlCacheOptions) {
        if (options.maxSize <= 0) {
            throw new Error('maxSize must be greater than 0')
        }
    }

    public get size(): number {
        return this.entries.size
    }

    public async get(key: string, loader: () => Promise<T>): Promise<T> {
        const now = Date.now()
        const entry = this.entries.get(key)

        if (entry && now < entry.expiresAt) {
            entry.lastUsed = now
            ttlCacheLookups.labels({ name: this.options.name, hit: 'hit' }).inc()
            return entry.value
        }

        const pendingLoad = this.pendingLoads.get(key)
        if (pendingLoad) {
            ttlCacheLookups.labels({ name: this.options.name, hit: 'queued' }).inc()
            return await pendingLoad
        }

        ttlCacheLookups.labels({ name: this.options.name, hit: 'miss' }).inc()
        logger.debug('[TtlCache]', this.options.name, 'Loading:', key)

        const load = loader()
            .then((value) => {
                this.set(key, value)
                return value
            })
            .finally(() => {
                this.pendingLoads.delete(key)
            })
        this.pendingLoads.set(key, load)

        return await load
    }

    public set(key: string, value: T): void {
        const now = Date.now()
        this.entries.set(key, { value, expiresAt: now + this.options.ttlMs, lastUsed: now })
        this.evictLRU()
        this.updateCacheSizeMetric()
    }

    public delete(key: string): void {
        this.entries.delete(key)
        this.updateCacheSizeMetric()
    }

    public clear(): void {
        this.entries.clear()
        // NOTE: We don't clear pendingLoads, they remove themselves once settled
        this.updateCacheSizeMetric()
    }

    private evictLRU(): void {
        const toEvict = this.entries.size - this.options.maxSize
        if (toEvict <= 0) {
            return
        }

        const keysToEvict = Array.from(this.entries.entries())
            .sort((a, b) => a[1].lastUsed - b[1].lastUsed)
            .slice(0, toEvict)
            .map(([key]) => key)

        for (const key of keysToEvict) {
            this.entries.delete(key)
        }
    }

    private updateCacheSizeMetric(): void {
        ttlCacheSize.labels({ name: this.options.name }).set(this.entries.size)
    }
}
