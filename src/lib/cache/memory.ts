import { CONFIG } from '@/lib/config'

export const CACHE_KEYS = {
  IMF_SERIES: (countryApiCode: string, indicatorApiCode: string, startYear: number, endYear: number) =>
    `imf:series:${countryApiCode}:${indicatorApiCode}:${startYear}-${endYear}`,
} as const

export const CACHE_TTL = {
  SERIES: CONFIG.cache.defaultTTL,
} as const

export interface CacheEntry<T> {
  value: T
  insertedAt: number
}

export interface TTLCacheOptions {
  ttlSeconds: number
  /** Clock in epoch milliseconds. */
  now?: () => number
}

/**
 * In-process cache mapping a request key to (value, insertion time).
 *
 * Entries older than the TTL are evicted on access. `getOrLoad` keeps at
 * most one load in flight per key: concurrent callers for a missing or
 * expired key share the same promise, and a rejected load stores nothing.
 */
export class TTLCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly inFlight = new Map<string, Promise<T>>()
  private readonly ttlMs: number
  private readonly now: () => number
  // Bumped by clear() so loads started before it do not write back.
  private generation = 0

  constructor({ ttlSeconds, now = Date.now }: TTLCacheOptions) {
    this.ttlMs = ttlSeconds * 1000
    this.now = now
  }

  get size(): number {
    return this.entries.size
  }

  get pending(): number {
    return this.inFlight.size
  }

  get(key: string): T | null {
    const entry = this.entries.get(key)
    if (!entry) return null
    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(key)
      return null
    }
    return entry.value
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, insertedAt: this.now() })
  }

  clear(): void {
    this.entries.clear()
    this.inFlight.clear()
    this.generation++
  }

  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key)
    if (cached !== null) {
      console.log(`[cache] hit for ${key}`)
      return cached
    }

    const pending = this.inFlight.get(key)
    if (pending) {
      console.log(`[cache] joining in-flight load for ${key}`)
      return pending
    }

    console.log(`[cache] miss for ${key}`)
    const generation = this.generation
    const promise = new Promise<T>((resolve) => resolve(load()))
      .then((value) => {
        if (generation === this.generation) this.set(key, value)
        return value
      })
      .finally(() => {
        if (generation === this.generation) this.inFlight.delete(key)
      })
    this.inFlight.set(key, promise)
    return promise
  }
}
