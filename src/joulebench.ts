import { createHarness, type Harness } from './core/harness'
import { validateConfig } from './core/config'
import type { HarnessConfig, HarnessRunSummary } from './core/types'
import { SpecRegistry, type LoadResult } from './registry'
import type { MeasureOptions } from './api'

/**
 * Examples:
 * ```ts
 * // Measure a directory of workload files
 * const summary = await measure({ workloads: 'workloads/examples', trials: 5 })
 *
 * // Without RAPL access, validate outputs only
 * const summary = await measure({ workloads: ['fib.yml'], sampler: { type: 'none' } })
 *
 * // With progress callbacks
 * const summary = await measure({
 *   workloads: 'workloads/examples',
 *   onTrialComplete: (trial) => console.log(trial.specKey, trial.outcome, trial.energyJoules),
 * })
 * ```
 */
export async function measure(options: MeasureOptions = {}): Promise<HarnessRunSummary> {
  const { cwd, signal } = options
  const config = resolveConfig(options)
  const harness = createHarness(config, options.deps)

  setupCallbacks(harness, options)

  return harness.run({ signal, cwd })
}

/**
 * Parses workload files without measuring them. Invalid files are reported in `errors`.
 */
export async function loadWorkloads(paths: string | string[], cwd?: string): Promise<LoadResult> {
  const registry = new SpecRegistry()
  return registry.loadFilesEach(Array.isArray(paths) ? paths : [paths], cwd)
}

/**
 * Validate options and apply defaults
 */
export function resolveConfig(options: MeasureOptions = {}): HarnessConfig {
  const { workloads } = options

  // Unknown keys (callbacks, signal, deps) are stripped by the schema
  return validateConfig({
    ...options,
    workloads: workloads === undefined ? [] : Array.isArray(workloads) ? workloads : [workloads],
  })
}

function setupCallbacks(harness: Harness, options: MeasureOptions): void {
  if (options.onStart) {
    harness.on('runStart', options.onStart)
  }

  if (options.onSpecStart) {
    harness.on('specStart', options.onSpecStart)
  }

  if (options.onTrialComplete) {
    harness.on('trialComplete', options.onTrialComplete)
  }

  if (options.onSpecComplete) {
    harness.on('specComplete', options.onSpecComplete)
  }

  if (options.onSpecFailed) {
    harness.on('specFailed', options.onSpecFailed)
  }

  if (options.onComplete) {
    harness.on('runComplete', options.onComplete)
  }
}
