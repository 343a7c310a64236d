/**
 * report-formatter.ts — Human-readable formatters for plans and run reports.
 *
 * Used by the `waymark graph plan`, `waymark run` and `waymark runs`
 * commands. JSON output bypasses these and serializes the data directly.
 */

import type { PlannedPhase } from '../../modules/phase-graph/execution-plan.js'
import type { RunReport } from '../../modules/phase-orchestrator/types.js'
import type { PlanTokenEstimate } from '../../modules/token-tracker/token-estimator.js'
import type { TokenReport } from '../../modules/token-tracker/token-tracker.js'
import type { Decision, RunSummary, StoredRun } from '../../persistence/schemas/runs.js'
import { formatTable, truncate } from '../utils/formatting.js'

const REQUEST_DISPLAY_LENGTH = 80
const LIST_REQUEST_LENGTH = 40

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)'
}

// ---------------------------------------------------------------------------
// formatGraphPlan
// ---------------------------------------------------------------------------

/**
 * Format the planned steps of every phase with their token estimates.
 */
export function formatGraphPlan(
  graphName: string,
  plan: readonly PlannedPhase[],
  estimate: PlanTokenEstimate,
): string {
  const lines: string[] = [`Graph: ${graphName}`]

  plan.forEach((phase, index) => {
    const after = phase.predecessors.length > 0 ? ` (after ${phase.predecessors.join(', ')})` : ''
    const tokens = estimate.byPhase[phase.phaseId] ?? 0
    lines.push(`${String(index + 1)}. ${phase.phaseId}${after} ~${String(tokens)} tokens`)

    for (const step of phase.steps) {
      const label = step.kind === 'parallel' ? 'parallel' : 'task'
      const skipped = step.skipped.length > 0 ? ` [skipped: ${step.skipped.join(', ')}]` : ''
      lines.push(`   ${label} ${step.id}: ${listOrNone(step.activated)}${skipped}`)
    }
  })

  lines.push('')
  lines.push(`Estimated tokens: ${String(estimate.total)} (${String(estimate.overhead)} coordination overhead)`)
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// formatRunReport
// ---------------------------------------------------------------------------

export function formatRunReport(report: RunReport, tokens?: TokenReport): string {
  const graph = report.graphName !== undefined ? ` (${report.graphName})` : ''
  const lines: string[] = [
    `Run ${report.runId}${graph}: ${report.status}`,
    `Request: ${truncate(report.request, REQUEST_DISPLAY_LENGTH)}`,
    `Domains: ${listOrNone(report.domains)}`,
    '',
    'Phases:',
    ...report.phases.map((p) => `  ${p.phaseId}: ${p.status}`),
  ]

  const results = Object.values(report.results)
  if (results.length > 0) {
    lines.push('')
    lines.push(
      formatTable(
        ['Task', 'Phase', 'Status', 'Attempt'],
        results.map((r) => ({
          task: r.taskId,
          phase: r.phaseId,
          status: r.status,
          attempt: String(r.attempt),
        })),
        ['task', 'phase', 'status', 'attempt'],
      ),
    )
  }

  if (report.conflicts.length > 0) {
    lines.push('')
    lines.push('Conflicts:')
    for (const conflict of report.conflicts) {
      const decision = conflict.resolution !== undefined ? ` -> ${conflict.resolution.decision}` : ''
      lines.push(`  ${conflict.id}: ${conflict.status}${decision}`)
    }
  }

  if (report.warnings.length > 0) {
    lines.push('')
    lines.push('Warnings:')
    for (const warning of report.warnings) lines.push(`  - ${warning}`)
  }

  if (report.abort !== undefined) {
    const at = report.abort.taskId !== undefined ? ` at task "${report.abort.taskId}"` : ''
    lines.push('')
    lines.push(`Aborted in phase "${report.abort.phaseId}"${at}: ${report.abort.reason}`)
  }

  if (tokens !== undefined) {
    lines.push('')
    lines.push(
      `Tokens: ${String(tokens.total)} (sequential estimate ${String(tokens.sequentialEstimate)}, overhead ${String(tokens.overheadPercent)}%)`,
    )
  }

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Run store listings
// ---------------------------------------------------------------------------

export function formatRunList(runs: readonly RunSummary[]): string {
  if (runs.length === 0) return 'No runs recorded.'
  return formatTable(
    ['Run', 'Graph', 'Status', 'Started', 'Request'],
    runs.map((run) => ({
      id: run.id,
      graph: run.graphName ?? '-',
      status: run.status,
      started: run.startedAt,
      request: truncate(run.request, LIST_REQUEST_LENGTH),
    })),
    ['id', 'graph', 'status', 'started', 'request'],
  )
}

export function formatStoredRun(run: StoredRun, decisions: readonly Decision[]): string {
  const lines: string[] = [
    `Run:       ${run.id}`,
    `Graph:     ${run.graphName ?? '-'}`,
    `Status:    ${run.status}`,
    `Started:   ${run.startedAt}`,
    `Completed: ${run.completedAt}`,
    `Domains:   ${listOrNone(run.domains)}`,
    `Request:   ${truncate(run.request, REQUEST_DISPLAY_LENGTH)}`,
  ]

  if (decisions.length > 0) {
    lines.push('')
    lines.push('Decisions:')
    for (const decision of decisions) {
      const rationale = decision.rationale !== null ? ` (${decision.rationale})` : ''
      lines.push(`  - ${decision.key}: ${decision.value}${rationale}`)
    }
  }

  return lines.join('\n')
}
