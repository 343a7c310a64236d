/**
 * RateLimiter — fixed-window call budget per resource key.
 *
 * A window opens on the first acquisition for a key and resets once its
 * duration has elapsed. Every mutation is synchronous, so a single instance
 * can be shared by concurrent evaluations on the event loop.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimiterOptions {
  /** Calls allowed per key per window; 0 blocks every call */
  maxRequests: number
  windowMs: number
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number
}

export interface RateLimiterStats {
  acquired: number
  rejected: number
  trackedKeys: number
}

interface RateLimitWindow {
  used: number
  windowStartAtMs: number
  budget: number
}

// ---------------------------------------------------------------------------
// RateLimiter
// ---------------------------------------------------------------------------

/**
 * @example
 * const limiter = new RateLimiter({ maxRequests: 30, windowMs: 60_000 })
 * if (limiter.tryAcquire('lib:react')) {
 *   // call the validator
 * }
 */
export class RateLimiter {
  private readonly _windows = new Map<string, RateLimitWindow>()
  private readonly _maxRequests: number
  private readonly _windowMs: number
  private readonly _now: () => number
  private _acquired = 0
  private _rejected = 0

  constructor(options: RateLimiterOptions) {
    this._maxRequests = options.maxRequests
    this._windowMs = options.windowMs
    this._now = options.now ?? Date.now
  }

  /**
   * Consume one call from the key's budget.
   * @returns false when the current window is exhausted
   */
  tryAcquire(key: string): boolean {
    const window = this._window(key)
    if (window.used >= window.budget) {
      this._rejected++
      return false
    }
    window.used++
    this._acquired++
    return true
  }

  getRemaining(key: string): number {
    const window = this._window(key)
    return Math.max(0, window.budget - window.used)
  }

  /** When the key's current window resets */
  getResetTime(key: string): Date {
    const window = this._window(key)
    return new Date(window.windowStartAtMs + this._windowMs)
  }

  /** Override the per-window budget for one key */
  setBudget(key: string, budget: number): void {
    this._window(key).budget = Math.max(0, budget)
  }

  getStats(): RateLimiterStats {
    return {
      acquired: this._acquired,
      rejected: this._rejected,
      trackedKeys: this._windows.size,
    }
  }

  private _window(key: string): RateLimitWindow {
    const now = this._now()
    let window = this._windows.get(key)
    if (window === undefined) {
      window = { used: 0, windowStartAtMs: now, budget: this._maxRequests }
      this._windows.set(key, window)
    } else if (now >= window.windowStartAtMs + this._windowMs) {
      window.used = 0
      window.windowStartAtMs = now
    }
    return window
  }
}
