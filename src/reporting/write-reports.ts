import { mkdir } from 'fs/promises'
import { join, resolve } from 'path'
import type { HarnessRunSummary, OutputConfig, TrialSet } from '../core/types'
import { logger } from '../logger'
import { CLIReporter, CSVReporter, JSONReporter } from './reporters'

export const JSON_REPORT_FILENAME = 'summaries.json'
export const CSV_REPORT_FILENAME = 'summaries.csv'

export interface WriteReportsOptions {
  cwd?: string
  trials?: TrialSet
  showColors?: boolean
}

/**
 * Emits every configured format. File formats land in `output.dir`; the cli
 * format prints to stdout. Returns the paths written.
 */
export async function writeReports(
  summary: HarnessRunSummary,
  output: OutputConfig,
  options: WriteReportsOptions = {},
): Promise<string[]> {
  const { cwd = process.cwd(), trials = [], showColors = true } = options
  const written: string[] = []
  const formats = new Set(output.formats)

  if (formats.has('json') || formats.has('csv')) {
    const dir = resolve(cwd, output.dir)
    await mkdir(dir, { recursive: true })

    if (formats.has('json')) {
      const filePath = join(dir, JSON_REPORT_FILENAME)
      const reporter = new JSONReporter({ includeTrials: output.includeTrials, prettyPrint: output.prettyPrint })
      await reporter.writeFile(summary, filePath, trials)
      written.push(filePath)
    }

    if (formats.has('csv')) {
      const filePath = join(dir, CSV_REPORT_FILENAME)
      await new CSVReporter().writeFile(summary, filePath)
      written.push(filePath)
    }

    for (const filePath of written) {
      logger.info(`Report written to ${filePath}`)
    }
  }

  if (formats.has('cli')) {
    new CLIReporter({ showColors }).print(summary)
  }

  return written
}
