import type { HarnessRunSummary, MeasurementSummary } from '../../core/types'
import pc from 'picocolors'

export interface CLIReporterOptions {
  showColors?: boolean
  // Decimal places for joule figures
  energyPrecision?: number
  maxNameLength?: number
}

/**
 * CLI Reporter that displays measurement summaries in a human-readable table format
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      energyPrecision: options.energyPrecision ?? 3,
      maxNameLength: options.maxNameLength ?? 40,
    }
  }

  /**
   * Generate CLI report from a run summary
   */
  generate(summary: HarnessRunSummary): string {
    const lines: string[] = []

    lines.push(this.formatHeader(summary))
    lines.push('')

    if (summary.summaries.length > 0) {
      lines.push(this.formatTable(summary.summaries))
      lines.push('')
    }

    lines.push(this.formatSummary(summary))

    return lines.join('\n')
  }

  print(summary: HarnessRunSummary): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(summary))
  }

  private formatHeader(summary: HarnessRunSummary): string {
    let status: string
    if (summary.cancelled) {
      status = this.colorize('⚠ CANCELLED', 'yellow')
    } else if (summary.failedSpecs.length > 0) {
      status = this.colorize('✗ FAILURES', 'red')
    } else {
      status = this.colorize('✓ COMPLETED', 'green')
    }

    const duration = `${(summary.duration / 1000).toFixed(1)}s`

    return `${status} Energy Measurement Results (${duration})`
  }

  private formatTable(summaries: MeasurementSummary[]): string {
    const headers = ['Workload', 'Language', 'Trials', 'Pass', 'Energy (J)', 'CI', 'Stddev', 'Time (ms)']

    const rows = summaries.map((measurement) => this.formatDataRow(measurement))
    const colWidths = this.calculateColumnWidths(headers, rows)

    const lines: string[] = []

    lines.push(this.formatRow(headers, colWidths))
    lines.push(this.formatSeparator(colWidths))

    for (const row of rows) {
      lines.push(this.formatRow(row, colWidths))
    }

    return lines.join('\n')
  }

  private formatDataRow(measurement: MeasurementSummary): string[] {
    const precision = this.options.energyPrecision
    const interval = measurement.confidenceInterval

    return [
      this.truncateName(measurement.spec.name),
      measurement.spec.language,
      `${measurement.sampleCount}/${measurement.trialCount}`,
      this.formatPassRate(measurement.passRate),
      measurement.mean === null ? '-' : measurement.mean.toFixed(precision),
      interval ? `±${((interval.upper - interval.lower) / 2).toFixed(precision)}` : '-',
      measurement.stddev === null ? '-' : measurement.stddev.toFixed(precision),
      measurement.duration.mean === null ? '-' : measurement.duration.mean.toFixed(1),
    ]
  }

  private formatPassRate(passRate: number): string {
    const text = `${Math.round(passRate * 100)}%`
    if (passRate === 1) return this.colorize(text, 'green')
    if (passRate === 0) return this.colorize(text, 'red')
    return this.colorize(text, 'yellow')
  }

  private calculateColumnWidths(headers: string[], rows: string[][]): number[] {
    const widths = headers.map((header) => header.length)

    for (const row of rows) {
      row.forEach((cell, index) => {
        // Strip ANSI colors for width calculation
        const cleanCell = this.stripColors(cell)
        widths[index] = Math.max(widths[index] || 0, cleanCell.length)
      })
    }

    return widths.map((width) => Math.max(width, 6)) // Minimum 6 chars
  }

  private formatRow(cells: string[], widths: number[]): string {
    return cells
      .map((cell, index) => {
        const cleanCell = this.stripColors(cell)
        const width = widths[index] || 0
        const padding = width - cleanCell.length
        return cell + ' '.repeat(Math.max(0, padding))
      })
      .join(' | ')
  }

  private formatSeparator(widths: number[]): string {
    return widths.map((width) => '-'.repeat(width)).join('-+-')
  }

  private formatSummary(summary: HarnessRunSummary): string {
    const lines: string[] = []

    lines.push(`Specs: ${summary.summaries.length} measured, ${summary.failedSpecs.length} failed`)

    if (summary.cancelled) {
      lines.push(this.colorize('Run was cancelled; summaries cover completed trial sets only', 'yellow'))
    }

    if (summary.failedSpecs.length > 0) {
      lines.push('')
      lines.push(this.colorize('Failed Specs:', 'red'))

      for (const failure of summary.failedSpecs) {
        // Messages already name their spec or source file
        lines.push(`  • ${failure.kind}: ${this.firstLine(failure.message)}`)
      }
    }

    return lines.join('\n')
  }

  private firstLine(message: string): string {
    return message.split('\n')[0] ?? ''
  }

  private truncateName(name: string): string {
    if (name.length <= this.options.maxNameLength) {
      return name
    }
    return name.slice(0, this.options.maxNameLength - 3) + '...'
  }

  private colorize(text: string, color: string): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'red':
        return pc.red(text)
      case 'yellow':
        return pc.yellow(text)
      case 'blue':
        return pc.blue(text)
      default:
        return text
    }
  }

  private stripColors(text: string): string {
    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, '')
  }
}
