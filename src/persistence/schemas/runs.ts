/**
 * Zod schemas for the run store: stored runs and arbitration decisions.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

export const SaveRunInputSchema = z.object({
  id: z.string().min(1),
  graph_name: z.string().min(1).nullable().optional(),
  status: z.string().min(1),
  request: z.string(),
  domains: z.array(z.string()),
  started_at: z.string().min(1),
  completed_at: z.string().min(1),
  report: z.record(z.string(), z.unknown()),
})
export type SaveRunInput = z.infer<typeof SaveRunInputSchema>

export const RunRowSchema = z.object({
  id: z.string(),
  graph_name: z.string().nullable(),
  status: z.string(),
  request: z.string(),
  domains_json: z.string(),
  report_json: z.string(),
  started_at: z.string(),
  completed_at: z.string(),
  created_at: z.string(),
})
export type RunRow = z.infer<typeof RunRowSchema>

/** A run without its report, as listed by listRuns() */
export interface RunSummary {
  id: string
  graphName: string | null
  status: string
  request: string
  domains: string[]
  startedAt: string
  completedAt: string
}

export interface StoredRun extends RunSummary {
  report: Record<string, unknown>
}

export const ListRunsOptionsSchema = z.object({
  limit: z.number().int().positive().max(1000).default(20),
  status: z.string().min(1).optional(),
})
export type ListRunsOptions = z.input<typeof ListRunsOptionsSchema>

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

export const DecisionSchema = z.object({
  id: z.string().uuid(),
  run_id: z.string(),
  phase: z.string().min(1),
  category: z.string().min(1),
  key: z.string().min(1),
  value: z.string().min(1),
  rationale: z.string().nullable(),
  created_at: z.string(),
})
export type Decision = z.infer<typeof DecisionSchema>

export const CreateDecisionInputSchema = z.object({
  run_id: z.string().min(1),
  phase: z.string().min(1),
  category: z.string().min(1),
  key: z.string().min(1),
  value: z.string().min(1),
  rationale: z.string().nullable().optional(),
})
export type CreateDecisionInput = z.infer<typeof CreateDecisionInputSchema>
