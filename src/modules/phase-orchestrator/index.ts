/**
 * phase-orchestrator module — Public API re-exports.
 */

// ---------------------------------------------------------------------------
// Orchestrator interface and factories
// ---------------------------------------------------------------------------

export type { PhaseOrchestrator } from './phase-orchestrator.js'
export {
  PhaseOrchestratorImpl,
  createPhaseOrchestrator,
  createPhaseOrchestratorFromConfig,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_GROUP_RETRY_LIMIT,
  DEFAULT_TASK_TIMEOUT_MS,
} from './phase-orchestrator-impl.js'
export type { OrchestratorFromConfigOptions } from './phase-orchestrator-impl.js'

// ---------------------------------------------------------------------------
// Step execution and reports
// ---------------------------------------------------------------------------

export { StepRunner, runWithConcurrency, skippedResult, toErrorInfo } from './step-runner.js'
export type { StepRunnerDeps, StepOutcome, StepAbort } from './step-runner.js'
export { buildRunReport, persistRunReport, runStatusOf } from './report-builder.js'
export type { ReportParts } from './report-builder.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  RunContext,
  RunStatus,
  RunReport,
  RunAbort,
  PhaseReport,
  StepReport,
  ValidationEntry,
  PhaseOrchestratorOptions,
} from './types.js'
