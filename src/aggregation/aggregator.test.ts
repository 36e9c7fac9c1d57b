import { describe, it, expect } from '@jest/globals'
import type { Trial, TrialOutcome } from '../core/types'
import { Aggregator, summarizeTrials } from './aggregator'

const spec = { name: 'fib', language: 'c' }
const options = { warmupDiscard: 1, outlierIqrMultiplier: 1.5, confidenceLevel: 0.95 as const }

function makeTrial(
  index: number,
  energyJoules: number | undefined,
  outcome: TrialOutcome = 'Pass',
  iterations = 1,
): Trial {
  const startTime = new Date(Date.UTC(2026, 0, 1, 0, 0, index))
  return {
    specKey: 'fib::c',
    index,
    iterations,
    startTime,
    endTime: startTime,
    durationMs: 100 * iterations,
    energyJoules,
    exitCode: outcome === 'NonZeroExit' ? 1 : 0,
    capturedStdout: '',
    outcome,
  }
}

describe('summarizeTrials', () => {
  it('should discard warm-up and reject IQR outliers', () => {
    const trials = [10, 11, 9, 10, 50].map((energy, index) => makeTrial(index, energy))

    const summary = summarizeTrials(spec, trials, options)

    expect(summary.warmupDiscarded).toBe(1)
    expect(summary.outliersRejected).toBe(1)
    expect(summary.sampleCount).toBe(3)
    expect(summary.mean).toBe(10)
    expect(summary.min).toBe(9)
    expect(summary.max).toBe(11)
    expect(summary.stddev).toBe(1)
    expect(summary.passRate).toBe(1)
    expect(summary.trialCount).toBe(5)
  })

  it('should compute a t-based confidence interval', () => {
    const trials = [10, 11, 9, 10].map((energy, index) => makeTrial(index, energy))

    const summary = summarizeTrials(spec, trials, { ...options, confidenceLevel: 0.9 })

    // samples [11, 9, 10]: mean 10, stddev 1, t(0.90, df 2) = 2.92
    expect(summary.confidenceInterval?.level).toBe(0.9)
    expect(summary.confidenceInterval?.lower).toBeCloseTo(10 - 2.92 / Math.sqrt(3), 6)
    expect(summary.confidenceInterval?.upper).toBeCloseTo(10 + 2.92 / Math.sqrt(3), 6)
  })

  it('should keep every sample below four', () => {
    const trials = [0, 5, 6, 500].map((energy, index) => makeTrial(index, energy))

    const summary = summarizeTrials(spec, trials, options)

    expect(summary.sampleCount).toBe(3)
    expect(summary.outliersRejected).toBe(0)
    expect(summary.max).toBe(500)
  })

  it('should only take energy from passing trials and count every trial in the pass rate', () => {
    const trials = [
      makeTrial(0, 10),
      makeTrial(1, 12),
      makeTrial(2, 99, 'OutputMismatch'),
      makeTrial(3, undefined, 'Timeout'),
      makeTrial(4, 14),
    ]

    const summary = summarizeTrials(spec, trials, options)

    expect(summary.sampleCount).toBe(2)
    expect(summary.mean).toBe(13)
    expect(summary.passCount).toBe(3)
    expect(summary.passRate).toBe(0.6)
  })

  it('should normalise energy and duration per iteration', () => {
    const trials = [makeTrial(0, 40, 'Pass', 4), makeTrial(1, 40, 'Pass', 4), makeTrial(2, 80, 'Pass', 4)]

    const summary = summarizeTrials(spec, trials, options)

    expect(summary.mean).toBe(15)
    expect(summary.duration.mean).toBe(100)
  })

  it('should report null statistics without energy samples', () => {
    const trials = [makeTrial(0, undefined), makeTrial(1, undefined)]

    const summary = summarizeTrials(spec, trials, options)

    expect(summary.sampleCount).toBe(0)
    expect(summary.mean).toBeNull()
    expect(summary.stddev).toBeNull()
    expect(summary.confidenceInterval).toBeNull()
    expect(summary.duration.sampleCount).toBe(1)
  })

  it('should handle an empty trial set', () => {
    const summary = summarizeTrials(spec, [], options)

    expect(summary.trialCount).toBe(0)
    expect(summary.passRate).toBe(0)
    expect(summary.warmupDiscarded).toBe(0)
    expect(summary.mean).toBeNull()
  })
})

describe('Aggregator', () => {
  it('should keep trials in insertion order per spec', () => {
    const aggregator = new Aggregator(options)
    aggregator.register(spec)

    aggregator.record(makeTrial(1, 10))
    aggregator.record(makeTrial(0, 11))

    expect(aggregator.trials(spec).map((trial) => trial.index)).toEqual([1, 0])
  })

  it('should freeze recorded trials', () => {
    const aggregator = new Aggregator(options)
    aggregator.register(spec)

    aggregator.record(makeTrial(0, 10))

    expect(Object.isFrozen(aggregator.trials(spec)[0])).toBe(true)
  })

  it('should reject trials for unregistered specs', () => {
    const aggregator = new Aggregator(options)

    expect(() => aggregator.record(makeTrial(0, 10))).toThrow('Trial recorded for unregistered spec fib::c')
  })

  it('should recompute snapshots from the current trial set', () => {
    const aggregator = new Aggregator({ ...options, warmupDiscard: 0 })
    aggregator.register(spec)
    aggregator.register({ name: 'sum', language: 'rust' })

    aggregator.record(makeTrial(0, 10))
    expect(aggregator.snapshot(spec).mean).toBe(10)

    aggregator.record(makeTrial(1, 20))
    expect(aggregator.snapshot(spec).mean).toBe(15)
    expect(aggregator.snapshots().map((summary) => summary.spec)).toEqual([spec, { name: 'sum', language: 'rust' }])
  })
})
