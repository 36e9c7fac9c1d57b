import type { MeasurementSummary, Trial, TrialSet } from '../core/types'
import { specKey } from '../core/types'
import type { SpecRef } from '../core/errors'
import { rejectOutliers, summarize, type ConfidenceLevel } from '../core/utils/statistics'
import type { TrialRecorder } from '../runner/trial-runner'

export interface AggregatorOptions {
  warmupDiscard: number
  outlierIqrMultiplier: number
  confidenceLevel: ConfidenceLevel
}

interface TrackedSet {
  spec: SpecRef
  trials: Trial[]
}

/**
 * Append-only trial sets, one per spec, in insertion order
 */
export class Aggregator implements TrialRecorder {
  private sets = new Map<string, TrackedSet>()

  constructor(private options: AggregatorOptions) {}

  register(spec: SpecRef): void {
    const key = specKey(spec)
    if (!this.sets.has(key)) {
      this.sets.set(key, { spec: { name: spec.name, language: spec.language }, trials: [] })
    }
  }

  record(trial: Trial): void {
    const set = this.sets.get(trial.specKey)
    if (!set) {
      throw new Error(`Trial recorded for unregistered spec ${trial.specKey}`)
    }
    set.trials.push(Object.isFrozen(trial) ? trial : Object.freeze({ ...trial }))
  }

  trials(spec: SpecRef): TrialSet {
    return [...(this.sets.get(specKey(spec))?.trials ?? [])]
  }

  snapshot(spec: SpecRef): MeasurementSummary {
    const set = this.sets.get(specKey(spec))
    return summarizeTrials(set?.spec ?? spec, set?.trials ?? [], this.options)
  }

  snapshots(): MeasurementSummary[] {
    return Array.from(this.sets.values()).map((set) => summarizeTrials(set.spec, set.trials, this.options))
  }
}

/**
 * Summary statistics for one trial set. Energy and duration are per
 * iteration; the first `warmupDiscard` trials never contribute.
 */
export function summarizeTrials(spec: SpecRef, trials: TrialSet, options: AggregatorOptions): MeasurementSummary {
  const passCount = trials.filter((trial) => trial.outcome === 'Pass').length
  const warmupDiscarded = Math.min(options.warmupDiscard, trials.length)
  const measured = trials.slice(warmupDiscarded).filter((trial) => trial.outcome === 'Pass')

  const energySamples: number[] = []
  measured.forEach((trial) => {
    if (trial.energyJoules !== undefined) {
      energySamples.push(trial.energyJoules / trial.iterations)
    }
  })

  const { kept, rejected } = rejectOutliers(energySamples, options.outlierIqrMultiplier)
  const durations = measured.map((trial) => trial.durationMs / trial.iterations)

  return {
    spec,
    ...summarize(kept, options.confidenceLevel),
    passRate: trials.length === 0 ? 0 : passCount / trials.length,
    trialCount: trials.length,
    passCount,
    warmupDiscarded,
    outliersRejected: rejected.length,
    duration: summarize(durations, options.confidenceLevel),
  }
}
