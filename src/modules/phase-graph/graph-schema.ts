/**
 * Zod schemas for phase graph definition files (YAML or JSON).
 */

import { z } from 'zod'
import { MAX_TIMER_DELAY_MS } from '../../utils/helpers.js'

export const SUPPORTED_GRAPH_VERSIONS = ['1'] as const

const IdSchema = z
  .string()
  .min(1, 'id is required')
  .regex(/^[A-Za-z0-9][A-Za-z0-9._:-]*$/, 'id may contain letters, digits, ".", "_", ":" and "-"')

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

export const TaskEntrySchema = z
  .object({
    id: IdSchema,
    description: z.string().optional(),
    /** Registered task implementation; "static" returns params.payload */
    kind: z.string().min(1).default('static'),
    critical: z.boolean().default(false),
    when: z
      .object({
        domains: z.array(z.string().min(1)),
      })
      .strict()
      .optional(),
    result_type: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
    validation: z
      .object({
        resource: z.string().min(1),
      })
      .strict()
      .optional(),
    params: z.record(z.string(), z.unknown()).default({}),
  })
  .strict()

export type TaskEntry = z.infer<typeof TaskEntrySchema>

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

export const GroupEntrySchema = z
  .object({
    id: IdSchema,
    tasks: z.array(z.string()),
  })
  .strict()

export const PhaseEntrySchema = z
  .object({
    id: IdSchema,
    description: z.string().optional(),
    after: z.array(z.string()).optional(),
    tasks: z.array(TaskEntrySchema),
    groups: z.array(GroupEntrySchema).default([]),
  })
  .strict()

export type PhaseEntry = z.infer<typeof PhaseEntrySchema>

// ---------------------------------------------------------------------------
// Graph file
// ---------------------------------------------------------------------------

export const ArbiterEntrySchema = z
  .object({
    kind: z.string().min(1),
    timeout_ms: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
    params: z.record(z.string(), z.unknown()).default({}),
  })
  .strict()

export type ArbiterEntry = z.infer<typeof ArbiterEntrySchema>

export const PhaseGraphFileSchema = z
  .object({
    version: z
      .union([z.string(), z.number()])
      .transform((v) => String(v))
      .superRefine((v, ctx) => {
        if (!(SUPPORTED_GRAPH_VERSIONS as readonly string[]).includes(v)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Graph version '${v}' is not supported. Supported: ${SUPPORTED_GRAPH_VERSIONS.join(', ')}`,
          })
        }
      }),
    name: z.string().min(1, 'Graph name is required'),
    description: z.string().optional(),
    arbiter: ArbiterEntrySchema.optional(),
    phases: z.array(PhaseEntrySchema).min(1, 'At least one phase is required'),
  })
  .strict()

export type PhaseGraphFile = z.infer<typeof PhaseGraphFileSchema>
