/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { WaymarkConfig, PartialWaymarkConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .waymark/ directory (default: <cwd>/.waymark) */
  projectConfigDir?: string
  /** Path to the global user-level .waymark/ directory (default: ~/.waymark) */
  globalConfigDir?: string
  /** Highest-priority values, typically populated from CLI flags */
  cliOverrides?: PartialWaymarkConfig
  /** Environment to read WAYMARK_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated Waymark configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): WaymarkConfig

  /**
   * Return a single value by dot-notation key (e.g. "validation.rate_limit.window_ms").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  readonly isLoaded: boolean
}
