/**
 * Barrel exports for the token-tracker module.
 */

export { estimateTaskTokens, groupOverhead, estimatePlanTokens } from './token-estimator.js'
export type { PlanTokenEstimate } from './token-estimator.js'
export { TokenTracker, createTokenTracker } from './token-tracker.js'
export type { TokenReport } from './token-tracker.js'
