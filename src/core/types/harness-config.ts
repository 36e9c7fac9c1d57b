import { z } from 'zod'
import { MeasurementModeSchema, NicenessSchema } from './workload'

export const SamplerConfigSchema = z.object({
  type: z.enum(['powercap', 'none']).default('powercap'),
  // Powercap sysfs root, overridable for containers that mount it elsewhere
  root: z.string().default('/sys/class/powercap'),
  // Zone directory names to sum, e.g. ['intel-rapl:0']; every top-level package zone when omitted
  zones: z.array(z.string().min(1)).optional(),
})

export type SamplerConfig = z.infer<typeof SamplerConfigSchema>

export const OutputConfigSchema = z.object({
  dir: z.string().default('./joulebench-results'),
  formats: z.array(z.enum(['cli', 'json', 'csv'])).default(['cli']),
  includeTrials: z.boolean().default(false),
  prettyPrint: z.boolean().default(true),
})

export type OutputConfig = z.infer<typeof OutputConfigSchema>

export const HarnessConfigSchema = z.object({
  workloads: z.array(z.string().min(1)).default([]),
  trials: z.number().int().positive().default(5),
  warmupDiscard: z.number().int().nonnegative().default(1),
  outlierIqrMultiplier: z.number().positive().default(1.5),
  confidenceLevel: z.union([z.literal(0.9), z.literal(0.95), z.literal(0.99)]).default(0.95),
  timeout: z.number().int().positive().default(300000), // 5 minutes per execution
  buildTimeout: z.number().int().positive().default(600000),
  killGraceMs: z.number().int().nonnegative().default(2000),
  buildConcurrency: z.number().int().positive().default(2),
  workDir: z.string().default('./.joulebench'),
  cooldownMs: z.number().int().nonnegative().default(0),
  shuffle: z.boolean().default(false),
  keepBuilds: z.boolean().default(false),
  // Scheduling priority for measured executions (`nice -n`); 0 or unset runs them unwrapped
  niceness: NicenessSchema.optional(),
  measurement: MeasurementModeSchema.default({ mode: 'per-invocation' }),
  sampler: SamplerConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
})

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>
