import { z } from 'zod'

// How repeated trials map onto sampling windows
export const MeasurementModeSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('per-invocation') }),
  z.object({
    mode: z.literal('iteration-aware'),
    iterations: z.number().int().positive().default(1),
  }),
])

export type MeasurementMode = z.infer<typeof MeasurementModeSchema>

const ArgSchema = z.union([z.string(), z.number()]).transform((value) => String(value))

export const NicenessSchema = z.number().int().min(-20).max(19)

const requiredText = (field: string) =>
  z.string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })

// On-disk workload definition (snake_case keys as written in workload files)
export const WorkloadSourceSchema = z.object({
  name: requiredText('name').trim().min(1, 'name is required'),
  language: requiredText('language').trim().min(1, 'language is required'),
  code: requiredText('code').min(1, 'code is required'),
  description: z.string().optional(),
  dependencies: z.array(z.string().min(1)).default([]),
  options: z.array(ArgSchema).default([]),
  args: z.array(ArgSchema).default([]),
  stdin: z.string().optional(),
  expected_stdout: requiredText('expected_stdout'),
  measurement: MeasurementModeSchema.optional(),
  niceness: NicenessSchema.optional(),
})

export type WorkloadSource = z.input<typeof WorkloadSourceSchema>

export interface WorkloadSpec {
  readonly name: string
  readonly language: string
  readonly code: string
  readonly description?: string
  readonly dependencies: readonly string[]
  readonly options: readonly string[]
  readonly args: readonly string[]
  readonly stdin?: string
  readonly expectedStdout: string
  readonly measurement?: MeasurementMode
  // Overrides the harness-wide niceness for this workload
  readonly niceness?: number
  // File or label the spec was loaded from
  readonly origin: string
}

/**
 * Registry key for a spec; languages compare case-insensitively
 */
export function specKey(spec: { name: string; language: string }): string {
  return `${spec.name}::${spec.language.trim().toLowerCase()}`
}
