/**
 * HTTP ExternalValidator — GET <endpoint>/<resourceId>, JSON response body.
 *
 * Timeouts are the gate's job: the request is bound to the signal the gate
 * passes in.
 */

import { ValidationUnavailableError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ExternalValidator } from './validation-gate.js'

const logger = createLogger('validation-gate:http')

export interface HttpValidatorOptions {
  endpoint: string
  /** Sent as "Authorization: Bearer <token>" */
  token?: string
  headers?: Record<string, string>
  /** Injectable fetch (default: global fetch) */
  fetchImpl?: typeof fetch
}

export class HttpValidator implements ExternalValidator {
  private readonly _endpoint: string
  private readonly _headers: Record<string, string>
  private readonly _fetch: typeof fetch

  constructor(options: HttpValidatorOptions) {
    this._endpoint = options.endpoint.replace(/\/+$/, '')
    this._headers = { accept: 'application/json', ...options.headers }
    if (options.token !== undefined) {
      this._headers['authorization'] = `Bearer ${options.token}`
    }
    this._fetch = options.fetchImpl ?? fetch
  }

  async validate(resourceId: string, signal: AbortSignal): Promise<unknown> {
    const url = `${this._endpoint}/${encodeURIComponent(resourceId)}`
    logger.debug({ resourceId, url }, 'Calling validator')

    const res = await this._fetch(url, { method: 'GET', headers: this._headers, signal })
    if (!res.ok) {
      throw new ValidationUnavailableError(resourceId, `HTTP ${String(res.status)}`)
    }
    const body: unknown = await res.json()
    return body
  }
}

/** Validator used when no endpoint is configured; every call fails */
export class UnavailableValidator implements ExternalValidator {
  validate(resourceId: string): Promise<unknown> {
    return Promise.reject(
      new ValidationUnavailableError(resourceId, 'no validator endpoint configured')
    )
  }
}

export function createHttpValidator(options: Partial<HttpValidatorOptions> = {}): ExternalValidator {
  if (options.endpoint === undefined || options.endpoint === '') {
    return new UnavailableValidator()
  }
  return new HttpValidator({ ...options, endpoint: options.endpoint })
}
