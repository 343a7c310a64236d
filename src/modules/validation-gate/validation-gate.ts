/**
 * ValidationGate interface — guards tasks that depend on an external,
 * rate-limited, cacheable validation collaborator.
 */

import type { ValidationRecord } from '../../core/types.js'

/**
 * The collaborator call a gate wraps. Receives an AbortSignal that fires on
 * timeout; resolves with the collaborator's raw structured report.
 */
export type ValidationCall = (signal: AbortSignal) => Promise<unknown>

/** An external validation collaborator */
export interface ExternalValidator {
  validate(resourceId: string, signal: AbortSignal): Promise<unknown>
}

export interface EvaluateOptions {
  /** Caller cancellation; an abort rejects evaluate() instead of degrading */
  signal?: AbortSignal
}

/**
 * Evaluation order:
 *  1. live cache hit → returned with cacheHit = true, no call
 *  2. an in-flight call for the same resource is shared
 *  3. resource in failure backoff → degraded record, no call
 *  4. rate limit exhausted → WARN, no call, cache untouched
 *  5. bounded call → classify, cache, return
 *  6. timeout / transport error / malformed report → stale record or WARN
 */
export interface ValidationGate {
  evaluate(
    resourceId: string,
    callFn: ValidationCall,
    options?: EvaluateOptions
  ): Promise<ValidationRecord>
}
