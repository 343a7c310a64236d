/**
 * Risk classification for external validation reports.
 *
 * Reports are validated with zod before classification; anything that does
 * not match ValidationReportSchema is a malformed report.
 */

import { z } from 'zod'
import type { GateDecision, RiskLevel } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Report schema
// ---------------------------------------------------------------------------

export const ValidationReportSchema = z
  .object({
    status: z.enum(['ok', 'outdated', 'deprecated', 'vulnerable', 'unknown']),
    issues: z
      .array(
        z.object({
          severity: z.enum(['low', 'medium', 'high', 'critical']),
          message: z.string(),
        })
      )
      .default([]),
    /** Collaborator-assigned risk score in [0, 1] */
    score: z.number().min(0).max(1).optional(),
  })
  .passthrough()

export type ValidationReport = z.infer<typeof ValidationReportSchema>

export interface RiskThresholdOptions {
  mediumScore: number
  highScore: number
}

/** Maps a collaborator's raw output to a risk level; throws on malformed output */
export type RiskClassifier = (output: unknown) => RiskLevel

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export function classifyReport(
  report: ValidationReport,
  thresholds: RiskThresholdOptions = { mediumScore: 0.4, highScore: 0.7 }
): RiskLevel {
  const severities = new Set(report.issues.map((i) => i.severity))
  const score = report.score ?? 0

  if (
    report.status === 'vulnerable' ||
    severities.has('high') ||
    severities.has('critical') ||
    score >= thresholds.highScore
  ) {
    return 'HIGH'
  }
  if (
    report.status !== 'ok' ||
    severities.has('medium') ||
    score >= thresholds.mediumScore
  ) {
    return 'MEDIUM'
  }
  return 'LOW'
}

/**
 * Build the default classifier: parse with ValidationReportSchema, then
 * apply classifyReport().
 */
export function createRiskClassifier(thresholds?: RiskThresholdOptions): RiskClassifier {
  return (output: unknown): RiskLevel => {
    const parsed = ValidationReportSchema.safeParse(output)
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')
      throw new Error(`malformed validation report (${detail})`)
    }
    return classifyReport(parsed.data, thresholds)
  }
}

/** HIGH → BLOCK, MEDIUM → WARN, LOW → ALLOW */
export function decisionForRisk(risk: RiskLevel): GateDecision {
  switch (risk) {
    case 'HIGH':
      return 'BLOCK'
    case 'MEDIUM':
      return 'WARN'
    case 'LOW':
      return 'ALLOW'
  }
}
