import type { HarnessRunSummary, MeasurementSummary } from '../../core/types'

export interface CSVReporterOptions {
  delimiter?: string
}

export const CSV_COLUMNS = [
  'name',
  'language',
  'trials',
  'passed',
  'pass_rate',
  'warmup_discarded',
  'outliers_rejected',
  'samples',
  'energy_mean_j',
  'energy_stddev_j',
  'energy_min_j',
  'energy_max_j',
  'ci_level',
  'ci_lower_j',
  'ci_upper_j',
  'time_mean_ms',
] as const

/**
 * One row per measured spec, for spreadsheets and plotting scripts
 */
export class CSVReporter {
  private options: Required<CSVReporterOptions>

  constructor(options: CSVReporterOptions = {}) {
    this.options = {
      delimiter: options.delimiter ?? ',',
    }
  }

  generate(summary: HarnessRunSummary): string {
    const lines = [CSV_COLUMNS.join(this.options.delimiter)]

    for (const measurement of summary.summaries) {
      lines.push(this.formatRow(measurement).join(this.options.delimiter))
    }

    return lines.join('\n') + '\n'
  }

  async writeFile(summary: HarnessRunSummary, filePath: string): Promise<void> {
    const fs = await import('fs/promises')
    await fs.writeFile(filePath, this.generate(summary), 'utf-8')
  }

  private formatRow(measurement: MeasurementSummary): string[] {
    const interval = measurement.confidenceInterval

    return [
      this.escape(measurement.spec.name),
      this.escape(measurement.spec.language),
      String(measurement.trialCount),
      String(measurement.passCount),
      String(measurement.passRate),
      String(measurement.warmupDiscarded),
      String(measurement.outliersRejected),
      String(measurement.sampleCount),
      this.number(measurement.mean),
      this.number(measurement.stddev),
      this.number(measurement.min),
      this.number(measurement.max),
      interval ? String(interval.level) : '',
      this.number(interval?.lower ?? null),
      this.number(interval?.upper ?? null),
      this.number(measurement.duration.mean),
    ]
  }

  private number(value: number | null): string {
    return value === null ? '' : String(value)
  }

  private escape(value: string): string {
    if (value.includes(this.options.delimiter) || /["\r\n]/.test(value)) {
      return `"${value.replace(/"/g, '""')}"`
    }
    return value
  }
}
