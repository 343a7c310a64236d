/**
 * Barrel exports for the validation-gate module.
 */

export type { ValidationGate, ExternalValidator, ValidationCall, EvaluateOptions } from './validation-gate.js'
export {
  ValidationGateImpl,
  createValidationGate,
  createValidationGateFromConfig,
} from './validation-gate-impl.js'
export type { ValidationGateOptions } from './validation-gate-impl.js'
export { TtlCache } from './ttl-cache.js'
export type { CacheLookup, TtlCacheOptions, TtlCacheStats } from './ttl-cache.js'
export { RateLimiter } from './rate-limiter.js'
export type { RateLimiterOptions, RateLimiterStats } from './rate-limiter.js'
export {
  ValidationReportSchema,
  classifyReport,
  createRiskClassifier,
  decisionForRisk,
} from './risk-classifier.js'
export type { ValidationReport, RiskClassifier, RiskThresholdOptions } from './risk-classifier.js'
export { HttpValidator, UnavailableValidator, createHttpValidator } from './http-validator.js'
export type { HttpValidatorOptions } from './http-validator.js'
