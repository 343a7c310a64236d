/**
 * Waymark - Main module exports
 * Public API surface for the engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export { maskSecrets } from './utils/masking.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { EngineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Engine modules
export * from './modules/config/index.js'
export * from './modules/phase-graph/index.js'
export * from './modules/validation-gate/index.js'
export * from './modules/conflict/index.js'
export * from './modules/phase-orchestrator/index.js'
export * from './modules/token-tracker/index.js'

// Run store
export { DatabaseWrapper, openDatabase } from './persistence/database.js'
export { saveRunReport, getRunReport, listRuns } from './persistence/queries/runs.js'
export { createDecision, getDecisionsForRun } from './persistence/queries/decisions.js'
export type { RunSummary, StoredRun, Decision, SaveRunInput, ListRunsOptions } from './persistence/schemas/runs.js'
