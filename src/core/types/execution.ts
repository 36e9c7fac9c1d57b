import type { BuildFailure } from '../errors'
import type { WorkloadSpec } from './workload'

export type BuildStatus = 'pending' | 'built' | 'failed'

// Resolved program a trial launches
export interface ExecutableHandle {
  path: string
  // Leading argv entries placed before the workload's own arguments (e.g. an interpreter's script path)
  argv: string[]
}

export interface BuildArtifact {
  spec: WorkloadSpec
  contentHash: string
  environment: string
  workdir: string
  executable?: ExecutableHandle
  buildLog: string
  status: BuildStatus
  failure?: BuildFailure
  builtAt?: Date
}

export interface RunCommand {
  command: string
  argv: string[]
  cwd: string
  env: Record<string, string>
}

export interface ProcessResult {
  exitCode: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  timedOut: boolean
  durationMs: number
}

export type TrialOutcome =
  | 'Pass'
  | 'OutputMismatch'
  | 'NonZeroExit'
  | 'Timeout'
  | 'BuildFailure'
  | 'MeasurementUnavailable'

export interface LineMismatch {
  // 1-based line number of the first difference after normalisation
  line: number
  expected?: string
  actual?: string
}

export interface Trial {
  readonly specKey: string
  readonly artifactHash?: string
  // 0-based position within the spec's trial set
  readonly index: number
  readonly iterations: number
  readonly startTime: Date
  readonly endTime: Date
  readonly durationMs: number
  readonly energyJoules?: number
  readonly exitCode: number | null
  readonly capturedStdout: string
  readonly outcome: TrialOutcome
  readonly mismatch?: LineMismatch
  readonly error?: string
}

export type TrialSet = readonly Trial[]

export interface SamplerReading {
  energyJoules?: number
}

export type TrialState =
  | 'Idle'
  | 'Building'
  | 'SamplerAcquire'
  | 'Executing'
  | 'Validating'
  | 'Recorded'
  | 'SamplerRelease'
