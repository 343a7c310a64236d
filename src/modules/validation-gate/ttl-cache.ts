/**
 * TtlCache — in-memory LRU cache with absolute per-entry expiry.
 *
 * Expired entries leave the live set lazily (on read or prune()). Their last
 * value is kept as a stale fallback until it is overwritten, invalidated or
 * evicted, so callers can degrade to it when a refresh fails.
 */

import { createLogger } from '../../utils/logger.js'

const logger = createLogger('validation-gate:cache')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Result of a cache lookup */
export type CacheLookup<T> =
  | { found: true; value: T }
  | { found: false; stale?: T }

export interface TtlCacheOptions {
  /** TTL applied when put() is called without one */
  defaultTtlMs: number
  /** Upper bound on live entries (and separately on stale entries) */
  maxEntries?: number
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number
}

export interface TtlCacheStats {
  size: number
  staleSize: number
  hits: number
  misses: number
  evictions: number
  hitRate: number
}

interface CacheEntry<T> {
  value: T
  expiresAt: number
}

// ---------------------------------------------------------------------------
// TtlCache
// ---------------------------------------------------------------------------

export class TtlCache<T> {
  private readonly _live = new Map<string, CacheEntry<T>>()
  private readonly _stale = new Map<string, T>()
  private readonly _defaultTtlMs: number
  private readonly _maxEntries: number
  private readonly _now: () => number
  private _hits = 0
  private _misses = 0
  private _evictions = 0

  constructor(options: TtlCacheOptions) {
    this._defaultTtlMs = options.defaultTtlMs
    this._maxEntries = options.maxEntries ?? 1000
    this._now = options.now ?? Date.now
  }

  /**
   * Look up a key. A live hit refreshes its LRU position; an expired entry
   * is moved to the stale set and reported as a miss carrying `stale`.
   */
  get(key: string): CacheLookup<T> {
    const entry = this._live.get(key)
    if (entry !== undefined) {
      if (this._now() < entry.expiresAt) {
        this._hits++
        this._live.delete(key)
        this._live.set(key, entry)
        return { found: true, value: entry.value }
      }
      this._live.delete(key)
      this._retainStale(key, entry.value)
      logger.debug({ key }, 'Cache entry expired')
    }

    this._misses++
    const stale = this._stale.get(key)
    return stale === undefined ? { found: false } : { found: false, stale }
  }

  /** Store a value with an absolute expiry of now + ttlMs */
  put(key: string, value: T, ttlMs: number = this._defaultTtlMs): void {
    this._stale.delete(key)
    this._live.delete(key)
    while (this._live.size >= this._maxEntries) {
      const oldest = this._live.keys().next()
      if (oldest.done === true) break
      this._live.delete(oldest.value)
      this._evictions++
      logger.debug({ key: oldest.value }, 'Cache eviction (LRU)')
    }
    this._live.set(key, { value, expiresAt: this._now() + ttlMs })
  }

  /** Drop a key entirely, including any stale fallback */
  invalidate(key: string): boolean {
    const hadLive = this._live.delete(key)
    const hadStale = this._stale.delete(key)
    return hadLive || hadStale
  }

  clear(): void {
    this._live.clear()
    this._stale.clear()
  }

  /**
   * Move every expired live entry to the stale set.
   * @returns number of entries pruned
   */
  prune(): number {
    const now = this._now()
    let pruned = 0
    for (const [key, entry] of this._live) {
      if (now >= entry.expiresAt) {
        this._live.delete(key)
        this._retainStale(key, entry.value)
        pruned++
      }
    }
    return pruned
  }

  getStats(): TtlCacheStats {
    const total = this._hits + this._misses
    return {
      size: this._live.size,
      staleSize: this._stale.size,
      hits: this._hits,
      misses: this._misses,
      evictions: this._evictions,
      hitRate: total > 0 ? this._hits / total : 0,
    }
  }

  private _retainStale(key: string, value: T): void {
    this._stale.delete(key)
    this._stale.set(key, value)
    while (this._stale.size > this._maxEntries) {
      const oldest = this._stale.keys().next()
      if (oldest.done === true) break
      this._stale.delete(oldest.value)
    }
  }
}
