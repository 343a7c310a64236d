/**
 * Credential masking for log output and externally sourced error strings.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Patterns that identify credential values embedded in free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // Authorization headers: "Bearer <token>"
  /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
  // token=..., api_key=..., apikey=... in query strings
  /\b(?:token|api_key|apikey|access_token)=[^&\s]+/gi,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
  // Generic long base64-looking tokens (>= 32 chars, no spaces)
  /[A-Za-z0-9+/]{32,}={0,2}/g,
]

/**
 * Redaction paths for credential fields, passed to `pino({ redact })`.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  'apiKey',
  'api_key',
  '*.token',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  '*.headers.authorization',
  'validation.token',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace recognized credential patterns in a string with `***`.
 *
 * Best effort: unknown secret formats pass through.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}
