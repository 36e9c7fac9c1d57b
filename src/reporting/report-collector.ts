import type { FailedSpec, HarnessRunSummary, MeasurementSummary } from '../core/types'
import { specKey } from '../core/types'
import { isHarnessError, SpecParseError, type SpecRef } from '../core/errors'

/**
 * ReportCollector accumulates spec summaries and failures during a harness
 * run and assembles the run summary handed to reporters
 */
export class ReportCollector {
  private summaries: Map<string, MeasurementSummary> = new Map()
  private failures: FailedSpec[] = []
  private runStartTime: Date
  private runEndTime?: Date
  private cancelled = false

  constructor() {
    this.runStartTime = new Date()
  }

  addSummary(summary: MeasurementSummary): void {
    // Only keep the latest summary for each spec
    this.summaries.set(specKey(summary.spec), summary)
  }

  addFailure(error: Error, spec?: SpecRef): void {
    const ref = isHarnessError(error) ? (error.spec ?? spec) : spec
    this.failures.push({
      spec: ref ? { name: ref.name, language: ref.language } : undefined,
      origin: error instanceof SpecParseError ? error.origin : undefined,
      kind: isHarnessError(error) ? error.kind : error.name,
      message: error.message,
    })
  }

  markCancelled(): void {
    this.cancelled = true
  }

  completeRun(): void {
    this.runEndTime = new Date()
  }

  getSummary(): HarnessRunSummary {
    const endTime = this.runEndTime || new Date()

    return {
      startTime: this.runStartTime,
      endTime,
      duration: endTime.getTime() - this.runStartTime.getTime(),
      cancelled: this.cancelled,
      summaries: Array.from(this.summaries.values()),
      failedSpecs: [...this.failures],
    }
  }

  getFailures(): FailedSpec[] {
    return [...this.failures]
  }

  isEmpty(): boolean {
    return this.summaries.size === 0 && this.failures.length === 0
  }

  clear(): void {
    this.summaries.clear()
    this.failures = []
    this.cancelled = false
    this.runStartTime = new Date()
    this.runEndTime = undefined
  }
}
