import type { HarnessRunSummary, StatisticSummary, TrialSet, TrialOutcome } from '../../core/types'

export interface JSONReporterOptions {
  includeTrials?: boolean
  prettyPrint?: boolean
}

/**
 * JSON schema for machine-readable measurement reports
 */
export interface JSONReport {
  run: {
    id: string
    startTime: string // ISO string
    endTime: string // ISO string
    duration: number // milliseconds
    cancelled: boolean
    measuredSpecs: number
    failedSpecs: number
  }

  // One entry per spec whose trial set completed; energy in joules per iteration
  summaries: Array<{
    name: string
    language: string
    trialCount: number
    passCount: number
    passRate: number
    warmupDiscarded: number
    outliersRejected: number
    energy: StatisticSummary
    duration: StatisticSummary
  }>

  failedSpecs: Array<{
    name?: string
    language?: string
    origin?: string
    kind: string
    message: string
  }>

  // Raw trials, only with includeTrials
  trials?: Array<{
    spec: string
    index: number
    iterations: number
    outcome: TrialOutcome
    startTime: string
    endTime: string
    durationMs: number
    energyJoules?: number
    exitCode: number | null
    mismatchLine?: number
    error?: string
  }>

  meta: {
    version: string
    generatedAt: string // ISO string
    generator: string
  }
}

/**
 * JSON Reporter that outputs machine-readable measurement results
 * for downstream analysis scripts and dashboards
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      includeTrials: options.includeTrials ?? false,
      prettyPrint: options.prettyPrint ?? false,
    }
  }

  generate(summary: HarnessRunSummary, trials: TrialSet = []): string {
    const report = this.createReport(summary, trials)

    if (this.options.prettyPrint) {
      return JSON.stringify(report, null, 2)
    }

    return JSON.stringify(report)
  }

  async writeFile(summary: HarnessRunSummary, filePath: string, trials: TrialSet = []): Promise<void> {
    const fs = await import('fs/promises')
    const content = this.generate(summary, trials)
    await fs.writeFile(filePath, content, 'utf-8')
  }

  private createReport(summary: HarnessRunSummary, trials: TrialSet): JSONReport {
    const runId = `run-${summary.startTime.getTime()}`

    const report: JSONReport = {
      run: {
        id: runId,
        startTime: summary.startTime.toISOString(),
        endTime: summary.endTime.toISOString(),
        duration: summary.duration,
        cancelled: summary.cancelled,
        measuredSpecs: summary.summaries.length,
        failedSpecs: summary.failedSpecs.length,
      },

      summaries: summary.summaries.map((measurement) => ({
        name: measurement.spec.name,
        language: measurement.spec.language,
        trialCount: measurement.trialCount,
        passCount: measurement.passCount,
        passRate: measurement.passRate,
        warmupDiscarded: measurement.warmupDiscarded,
        outliersRejected: measurement.outliersRejected,
        energy: this.statistics(measurement),
        duration: this.statistics(measurement.duration),
      })),

      failedSpecs: summary.failedSpecs.map((failure) => ({
        name: failure.spec?.name,
        language: failure.spec?.language,
        origin: failure.origin,
        kind: failure.kind,
        message: failure.message,
      })),

      meta: {
        version: '1.0.0',
        generatedAt: new Date().toISOString(),
        generator: 'joulebench-json-reporter',
      },
    }

    if (this.options.includeTrials) {
      report.trials = trials.map((trial) => ({
        spec: trial.specKey,
        index: trial.index,
        iterations: trial.iterations,
        outcome: trial.outcome,
        startTime: trial.startTime.toISOString(),
        endTime: trial.endTime.toISOString(),
        durationMs: trial.durationMs,
        energyJoules: trial.energyJoules,
        exitCode: trial.exitCode,
        mismatchLine: trial.mismatch?.line,
        error: trial.error,
      }))
    }

    return report
  }

  private statistics(stats: StatisticSummary): StatisticSummary {
    return {
      sampleCount: stats.sampleCount,
      mean: stats.mean,
      stddev: stats.stddev,
      min: stats.min,
      max: stats.max,
      confidenceInterval: stats.confidenceInterval ? { ...stats.confidenceInterval } : null,
    }
  }
}
