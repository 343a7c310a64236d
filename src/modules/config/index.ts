/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  WaymarkConfigSchema,
  PartialWaymarkConfigSchema,
  GlobalSettingsSchema,
  ValidationSettingsSchema,
  ConflictSettingsSchema,
  TokenSettingsSchema,
} from './config-schema.js'
export type {
  WaymarkConfig,
  PartialWaymarkConfig,
  GlobalSettings,
  ValidationSettings,
  ConflictSettings,
  TokenSettings,
  RateLimitConfig,
  BackoffConfig,
  RiskThresholds,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_TOKEN_MULTIPLIERS } from './defaults.js'
