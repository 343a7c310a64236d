/**
 * ValidationGateImpl — cache → coalesce → backoff → rate limit → bounded call.
 *
 * Collaborator failures never propagate: they degrade to a stale record or
 * a WARN record. Only caller cancellation rejects evaluate().
 */

import type { RiskLevel, ValidationRecord } from '../../core/types.js'
import { ValidationUnavailableError } from '../../core/errors.js'
import type { ValidationSettings } from '../config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import { withTimeout } from '../../utils/helpers.js'
import { maskSecrets } from '../../utils/masking.js'
import { TtlCache } from './ttl-cache.js'
import { RateLimiter } from './rate-limiter.js'
import {
  createRiskClassifier,
  decisionForRisk,
  type RiskClassifier,
} from './risk-classifier.js'
import type { EvaluateOptions, ValidationCall, ValidationGate } from './validation-gate.js'

const logger = createLogger('validation-gate')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ValidationGateOptions {
  cache?: TtlCache<ValidationRecord>
  rateLimiter?: RateLimiter
  classifier?: RiskClassifier
  /** Upper bound on a single collaborator call (default: 10s) */
  callTimeoutMs?: number
  /** TTL for successful records (default: 1h) */
  cacheTtlMs?: number
  /** Exponential backoff after collaborator failures */
  backoff?: { baseMs: number; maxMs: number }
  now?: () => number
}

interface BackoffState {
  failures: number
  untilMs: number
}

// ---------------------------------------------------------------------------
// ValidationGateImpl
// ---------------------------------------------------------------------------

export class ValidationGateImpl implements ValidationGate {
  private readonly _cache: TtlCache<ValidationRecord>
  private readonly _rateLimiter: RateLimiter
  private readonly _classifier: RiskClassifier
  private readonly _callTimeoutMs: number
  private readonly _cacheTtlMs: number
  private readonly _backoffBaseMs: number
  private readonly _backoffMaxMs: number
  private readonly _now: () => number
  private readonly _inFlight = new Map<string, Promise<ValidationRecord>>()
  private readonly _backoff = new Map<string, BackoffState>()

  constructor(options: ValidationGateOptions = {}) {
    this._now = options.now ?? Date.now
    this._cacheTtlMs = options.cacheTtlMs ?? 3_600_000
    this._cache =
      options.cache ?? new TtlCache<ValidationRecord>({ defaultTtlMs: this._cacheTtlMs, now: this._now })
    this._rateLimiter =
      options.rateLimiter ?? new RateLimiter({ maxRequests: 30, windowMs: 60_000, now: this._now })
    this._classifier = options.classifier ?? createRiskClassifier()
    this._callTimeoutMs = options.callTimeoutMs ?? 10_000
    this._backoffBaseMs = options.backoff?.baseMs ?? 1_000
    this._backoffMaxMs = options.backoff?.maxMs ?? 60_000
  }

  async evaluate(
    resourceId: string,
    callFn: ValidationCall,
    options: EvaluateOptions = {}
  ): Promise<ValidationRecord> {
    const { signal } = options
    throwIfAborted(signal)

    const lookup = this._cache.get(resourceId)
    if (lookup.found) {
      logger.debug({ resourceId }, 'Validation cache hit')
      return { ...lookup.value, cacheHit: true }
    }
    const stale = lookup.stale

    const pending = this._inFlight.get(resourceId)
    if (pending !== undefined) {
      return raceSignal(pending, signal)
    }

    const backoff = this._backoff.get(resourceId)
    if (backoff !== undefined && this._now() < backoff.untilMs) {
      const until = new Date(backoff.untilMs).toISOString()
      return this._degraded(resourceId, stale, `validation unavailable (backing off until ${until})`)
    }

    if (!this._rateLimiter.tryAcquire(resourceId)) {
      const reset = this._rateLimiter.getResetTime(resourceId).toISOString()
      logger.info({ resourceId, reset }, 'Validation skipped: rate limit exhausted')
      return {
        resourceId,
        risk: null,
        decision: 'WARN',
        cacheHit: false,
        stale: false,
        note: `validation skipped: rate limit exhausted until ${reset}`,
        timestamp: this._timestamp(),
      }
    }

    const call = this._call(resourceId, callFn, stale).finally(() => {
      this._inFlight.delete(resourceId)
    })
    this._inFlight.set(resourceId, call)
    return raceSignal(call, signal)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** Runs the collaborator call; always resolves */
  private async _call(
    resourceId: string,
    callFn: ValidationCall,
    stale: ValidationRecord | undefined
  ): Promise<ValidationRecord> {
    try {
      const output = await withTimeout(
        callFn,
        this._callTimeoutMs,
        () => new ValidationUnavailableError(
          resourceId,
          `timed out after ${String(this._callTimeoutMs)}ms`
        )
      )
      let risk: RiskLevel
      try {
        risk = this._classifier(output)
      } catch (err) {
        throw new ValidationUnavailableError(resourceId, errorMessage(err))
      }

      const record: ValidationRecord = {
        resourceId,
        risk,
        decision: decisionForRisk(risk),
        cacheHit: false,
        stale: false,
        timestamp: this._timestamp(),
      }
      this._cache.put(resourceId, record, this._cacheTtlMs)
      this._backoff.delete(resourceId)
      logger.debug({ resourceId, risk, decision: record.decision }, 'Validation evaluated')
      return record
    } catch (err) {
      const reason = maskSecrets(errorMessage(err))
      const delayMs = this._registerFailure(resourceId)
      logger.warn({ resourceId, reason, backoffMs: delayMs }, 'Validation collaborator unavailable')
      return this._degraded(resourceId, stale, `validation unavailable: ${reason}`)
    }
  }

  /** Record a failure and return the backoff delay now in effect */
  private _registerFailure(resourceId: string): number {
    const failures = (this._backoff.get(resourceId)?.failures ?? 0) + 1
    const delayMs = Math.min(this._backoffBaseMs * Math.pow(2, failures - 1), this._backoffMaxMs)
    this._backoff.set(resourceId, { failures, untilMs: this._now() + delayMs })
    return delayMs
  }

  /**
   * Stale records keep a BLOCK verdict; anything else degrades to WARN.
   */
  private _degraded(
    resourceId: string,
    stale: ValidationRecord | undefined,
    note: string
  ): ValidationRecord {
    if (stale !== undefined) {
      return {
        ...stale,
        decision: stale.decision === 'BLOCK' ? 'BLOCK' : 'WARN',
        cacheHit: false,
        stale: true,
        note: `${note}; using stale record from ${stale.timestamp}`,
      }
    }
    return {
      resourceId,
      risk: null,
      decision: 'WARN',
      cacheHit: false,
      stale: false,
      note,
      timestamp: this._timestamp(),
    }
  }

  private _timestamp(): string {
    return new Date(this._now()).toISOString()
  }
}

// ---------------------------------------------------------------------------
// Signal helpers
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  if (err instanceof ValidationUnavailableError) return err.reason
  return err instanceof Error ? err.message : String(err)
}

function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason
  return reason instanceof Error ? reason : new Error('Validation cancelled')
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) throw abortError(signal)
}

/** Resolve with `promise` unless `signal` aborts first */
function raceSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (signal === undefined) return promise
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortError(signal))
    }
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      }
    )
  })
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createValidationGate(options: ValidationGateOptions = {}): ValidationGate {
  return new ValidationGateImpl(options)
}

/**
 * Build a gate whose cache, rate limiter, classifier and timeouts come from
 * the `validation` config section.
 */
export function createValidationGateFromConfig(
  settings: ValidationSettings,
  now: () => number = Date.now
): ValidationGate {
  return new ValidationGateImpl({
    cache: new TtlCache<ValidationRecord>({
      defaultTtlMs: settings.cache_ttl_ms,
      maxEntries: settings.cache_max_entries,
      now,
    }),
    rateLimiter: new RateLimiter({
      maxRequests: settings.rate_limit.max_requests,
      windowMs: settings.rate_limit.window_ms,
      now,
    }),
    classifier: createRiskClassifier({
      mediumScore: settings.risk.medium_score,
      highScore: settings.risk.high_score,
    }),
    callTimeoutMs: settings.call_timeout_ms,
    cacheTtlMs: settings.cache_ttl_ms,
    backoff: { baseMs: settings.backoff.base_ms, maxMs: settings.backoff.max_ms },
    now,
  })
}
