/**
 * Zod validation schemas for the Waymark configuration system.
 *
 * Sections:
 *  - global engine settings (concurrency, retries, timeouts)
 *  - validation gate (cache, rate limit, backoff, risk thresholds)
 *  - conflict detection / arbitration
 *  - token accounting
 */

import { z } from 'zod'
import { MAX_TIMER_DELAY_MS } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Upper bound on concurrently running members of one parallel group */
    max_concurrency: z.number().int().min(1).max(64),
    /** Whole-group retries after a transient member failure */
    group_retry_limit: z.number().int().min(0).max(5),
    /** Default per-task timeout when a TaskSpec sets none */
    task_timeout_ms: z.number().int().positive().max(MAX_TIMER_DELAY_MS),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Validation gate
// ---------------------------------------------------------------------------

export const RateLimitSchema = z
  .object({
    /** Calls allowed per resource per window; 0 blocks every call */
    max_requests: z.number().int().min(0),
    window_ms: z.number().int().positive(),
  })
  .strict()

export type RateLimitConfig = z.infer<typeof RateLimitSchema>

export const BackoffSchema = z
  .object({
    base_ms: z.number().int().positive(),
    max_ms: z.number().int().positive(),
  })
  .strict()

export type BackoffConfig = z.infer<typeof BackoffSchema>

export const RiskThresholdsSchema = z
  .object({
    medium_score: z.number().min(0).max(1),
    high_score: z.number().min(0).max(1),
  })
  .strict()

export type RiskThresholds = z.infer<typeof RiskThresholdsSchema>

export const ValidationSettingsSchema = z
  .object({
    cache_ttl_ms: z.number().int().positive(),
    cache_max_entries: z.number().int().positive(),
    call_timeout_ms: z.number().int().positive().max(MAX_TIMER_DELAY_MS),
    rate_limit: RateLimitSchema,
    backoff: BackoffSchema,
    risk: RiskThresholdsSchema,
    /** Base URL of the HTTP validator; unset means validation is unavailable */
    endpoint: z.string().url().optional(),
    /** Bearer token sent to the HTTP validator */
    token: z.string().optional(),
  })
  .strict()

export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>

// ---------------------------------------------------------------------------
// Conflicts and tokens
// ---------------------------------------------------------------------------

export const ConflictSettingsSchema = z
  .object({
    /** Payload fields compared between members of a parallel group */
    compared_fields: z.array(z.string().min(1)),
    /** Minimum winning share for the weighted-vote arbiter */
    tie_break_margin: z.number().min(0).max(1),
  })
  .strict()

export type ConflictSettings = z.infer<typeof ConflictSettingsSchema>

export const TokenSettingsSchema = z
  .object({
    /** Per-task estimate multipliers keyed by task id */
    multipliers: z.record(z.string(), z.number().positive()),
    /** Coordination overhead added to parallel groups (0.1 = 10%) */
    parallel_overhead: z.number().min(0).max(1),
  })
  .strict()

export type TokenSettings = z.infer<typeof TokenSettingsSchema>

// ---------------------------------------------------------------------------
// Full config document
// ---------------------------------------------------------------------------

export const WaymarkConfigSchema = z
  .object({
    global: GlobalSettingsSchema,
    validation: ValidationSettingsSchema,
    conflicts: ConflictSettingsSchema,
    tokens: TokenSettingsSchema,
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.validation.risk.medium_score > cfg.validation.risk.high_score) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['validation', 'risk', 'medium_score'],
        message: 'medium_score must not exceed high_score',
      })
    }
    if (cfg.validation.backoff.base_ms > cfg.validation.backoff.max_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['validation', 'backoff', 'base_ms'],
        message: 'base_ms must not exceed max_ms',
      })
    }
  })

export type WaymarkConfig = z.infer<typeof WaymarkConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env and CLI overlays before merging)
// ---------------------------------------------------------------------------

export const PartialValidationSettingsSchema = z
  .object({
    cache_ttl_ms: z.number().int().positive().optional(),
    cache_max_entries: z.number().int().positive().optional(),
    call_timeout_ms: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
    rate_limit: RateLimitSchema.partial().optional(),
    backoff: BackoffSchema.partial().optional(),
    risk: RiskThresholdsSchema.partial().optional(),
    endpoint: z.string().url().optional(),
    token: z.string().optional(),
  })
  .strict()

export const PartialWaymarkConfigSchema = z
  .object({
    global: GlobalSettingsSchema.partial().optional(),
    validation: PartialValidationSettingsSchema.optional(),
    conflicts: ConflictSettingsSchema.partial().optional(),
    tokens: TokenSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialWaymarkConfig = z.infer<typeof PartialWaymarkConfigSchema>
