/**
 * Basic usage:
 * ```ts
 * import { measure } from 'joulebench'
 *
 * const summary = await measure({
 *   workloads: ['workloads/examples'],
 *   trials: 10,
 *   sampler: { type: 'powercap' },
 * })
 * ```
 */

import type {
  HarnessConfigInput,
  HarnessRunSummary,
  MeasurementSummary,
  Trial,
  WorkloadSpec,
} from './core/types'
import type { HarnessDeps } from './core/harness'

export interface MeasureOptions extends Omit<HarnessConfigInput, 'workloads'> {
  /** Workload file(s) or directories to load (default: none) */
  workloads?: string | string[]

  /** Base directory for relative workload paths (default: process.cwd()) */
  cwd?: string

  /** Aborting stops the run after the current trial */
  signal?: AbortSignal

  /** Replacement collaborators, mainly for tests */
  deps?: HarnessDeps

  /** Progress callbacks */
  onStart?: (specCount: number) => void
  onSpecStart?: (spec: WorkloadSpec) => void
  onTrialComplete?: (trial: Trial) => void
  onSpecComplete?: (summary: MeasurementSummary) => void
  onSpecFailed?: (spec: WorkloadSpec, error: Error) => void
  onComplete?: (summary: HarnessRunSummary) => void
}
