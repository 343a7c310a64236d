/**
 * Built-in default values for the Waymark configuration system.
 *
 * Lowest priority; overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { WaymarkConfig } from './config-schema.js'

/** Estimate multipliers for the built-in methodology catalog */
export const DEFAULT_TOKEN_MULTIPLIERS: Record<string, number> = {
  'knowledge-query': 1.5,
  'pattern-apply': 1.3,
  'doc-planning': 1.1,
  'data-flow': 1.5,
  'auth-analyst': 1.7,
  'writing-specialist': 1.6,
  'academic-analyst': 2.2,
  'gap-analysis': 1.4,
  'enhanced-analysis': 2.0,
  'cross-reference': 1.6,
  'diagram-validation': 1.4,
  'execution-bridge': 1.8,
  arbiter: 1.2,
}

export const DEFAULT_CONFIG: WaymarkConfig = {
  global: {
    log_level: 'warn',
    max_concurrency: 4,
    group_retry_limit: 1,
    task_timeout_ms: 120_000,
  },
  validation: {
    cache_ttl_ms: 3_600_000,
    cache_max_entries: 500,
    call_timeout_ms: 10_000,
    rate_limit: {
      max_requests: 30,
      window_ms: 60_000,
    },
    backoff: {
      base_ms: 1_000,
      max_ms: 60_000,
    },
    risk: {
      medium_score: 0.4,
      high_score: 0.7,
    },
  },
  conflicts: {
    compared_fields: ['recommendation', 'recommended_approach'],
    tie_break_margin: 0.1,
  },
  tokens: {
    multipliers: DEFAULT_TOKEN_MULTIPLIERS,
    parallel_overhead: 0.1,
  },
}
