/**
 * Decision queries: arbitration outcomes recorded during a run.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { randomUUID } from 'crypto'
import { z } from 'zod'
import {
  CreateDecisionInputSchema,
  DecisionSchema,
  type CreateDecisionInput,
  type Decision,
} from '../schemas/runs.js'

export type { CreateDecisionInput, Decision }

/**
 * Insert a new decision record with a generated UUID.
 */
export function createDecision(db: BetterSqlite3Database, input: CreateDecisionInput): Decision {
  const validated = CreateDecisionInputSchema.parse(input)
  const id = randomUUID()

  db.prepare(`
    INSERT INTO decisions (id, run_id, phase, category, key, value, rationale)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    validated.run_id,
    validated.phase,
    validated.category,
    validated.key,
    validated.value,
    validated.rationale ?? null,
  )

  return DecisionSchema.parse(db.prepare('SELECT * FROM decisions WHERE id = ?').get(id))
}

/**
 * All decisions for a run, oldest first.
 */
export function getDecisionsForRun(db: BetterSqlite3Database, runId: string): Decision[] {
  const rows: unknown[] = db
    .prepare('SELECT * FROM decisions WHERE run_id = ? ORDER BY created_at ASC, rowid ASC')
    .all(runId)
  return z.array(DecisionSchema).parse(rows)
}
