/**
 * Unit tests for RateLimiter
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { RateLimiter } from '../rate-limiter.js'

let now: number

beforeEach(() => {
  now = 0
})

function makeLimiter(maxRequests = 2): RateLimiter {
  return new RateLimiter({ maxRequests, windowMs: 1_000, now: () => now })
}

describe('RateLimiter', () => {
  it('allows calls up to the budget within a window', () => {
    const limiter = makeLimiter()
    expect(limiter.tryAcquire('r')).toBe(true)
    expect(limiter.tryAcquire('r')).toBe(true)
    expect(limiter.tryAcquire('r')).toBe(false)
    expect(limiter.getRemaining('r')).toBe(0)
  })

  it('tracks budgets per key', () => {
    const limiter = makeLimiter(1)
    expect(limiter.tryAcquire('a')).toBe(true)
    expect(limiter.tryAcquire('b')).toBe(true)
    expect(limiter.tryAcquire('a')).toBe(false)
  })

  it('resets at the window boundary', () => {
    const limiter = makeLimiter(1)
    limiter.tryAcquire('r')
    now = 999
    expect(limiter.tryAcquire('r')).toBe(false)
    now = 1_000
    expect(limiter.tryAcquire('r')).toBe(true)
  })

  it('reports the reset time of the current window', () => {
    const limiter = makeLimiter()
    now = 250
    limiter.tryAcquire('r')
    expect(limiter.getResetTime('r').getTime()).toBe(1_250)
  })

  it('a zero budget blocks every call', () => {
    const limiter = makeLimiter()
    limiter.setBudget('r', 0)
    expect(limiter.tryAcquire('r')).toBe(false)
    expect(limiter.getStats()).toEqual({ acquired: 0, rejected: 1, trackedKeys: 1 })
  })
})
