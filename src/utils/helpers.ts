/**
 * General utility helpers for Waymark
 */

import { randomUUID } from 'crypto'

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/**
 * Structural equality for JSON-like values. Object key order is ignored.
 */
export function isDeepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((item, i) => isDeepEqual(item, b[i]))
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a)
    if (aKeys.length !== Object.keys(b).length) return false
    return aKeys.every((k) => Object.prototype.hasOwnProperty.call(b, k) && isDeepEqual(a[k], b[k]))
  }
  return false
}

/**
 * JSON serialization with object keys sorted at every level.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value))
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys)
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(value[key])
    }
    return out
  }
  return value
}

/**
 * Recursively freeze a plain-object / array tree in place.
 * Functions, class instances and other special objects are left untouched.
 */
export function deepFreeze<T>(value: T): T {
  if (Array.isArray(value)) {
    for (const item of value) deepFreeze(item)
    Object.freeze(value)
  } else if (isPlainObject(value)) {
    for (const key of Object.keys(value)) deepFreeze(value[key])
    Object.freeze(value)
  }
  return value
}

/** Largest delay setTimeout honours; longer delays fire immediately */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

/**
 * Race an operation against a timer.
 *
 * The operation receives an AbortSignal that fires on timeout or when
 * `parent` aborts. On timeout `onTimeout()` supplies the rejection; a parent
 * abort rejects with the parent's reason. Delays above MAX_TIMER_DELAY_MS
 * are clamped to it.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController()
  return new Promise<T>((resolve, reject) => {
    let settled = false
    const settle = (): boolean => {
      if (settled) return false
      settled = true
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
      return true
    }
    const onParentAbort = (): void => {
      if (!settle()) return
      const reason: unknown = parent?.reason
      controller.abort(reason)
      reject(reason instanceof Error ? reason : new Error('Operation aborted'))
    }
    const timer = setTimeout(() => {
      if (!settle()) return
      const err = onTimeout()
      controller.abort(err)
      reject(err)
    }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS))

    if (parent?.aborted === true) {
      onParentAbort()
      return
    }
    parent?.addEventListener('abort', onParentAbort, { once: true })

    void Promise.resolve()
      .then(() => fn(controller.signal))
      .then(
        (value) => {
          if (settle()) resolve(value)
        },
        (err: unknown) => {
          if (settle()) reject(err)
        }
      )
  })
}
