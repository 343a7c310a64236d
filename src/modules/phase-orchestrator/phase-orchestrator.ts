/**
 * PhaseOrchestrator interface.
 *
 * Walks a PhaseGraph phase by phase, runs sequential steps and parallel
 * groups, arbitrates conflicts and aggregates a RunReport. The whole graph
 * is the only unit of execution: there is no way to start mid-graph or to
 * skip a phase.
 */

import type { PhaseGraph } from '../phase-graph/types.js'
import type { RunContext, RunReport } from './types.js'

// ---------------------------------------------------------------------------
// PhaseOrchestrator
// ---------------------------------------------------------------------------

export interface PhaseOrchestrator {
  /**
   * Execute every phase of `graph` in topological order.
   *
   * Resolves with a report for completed and aborted runs alike; an aborted
   * report carries the abort cause and stops at the aborting phase.
   *
   * @throws {GraphDefinitionError} if a task needs validation and no gate was configured
   */
  run(graph: PhaseGraph, context: RunContext): Promise<RunReport>
}
