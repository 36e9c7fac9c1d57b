/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig, ConfigLoadError, ConfigValidationError } from '../../core/config'
import { createHarness, type Harness } from '../../core/harness'
import { formatSpecRef, isHarnessError } from '../../core/errors'
import type { HarnessConfig, HarnessRunSummary, MeasurementSummary, Trial, WorkloadSpec } from '../../core/types'
import { JSONReporter, writeReports } from '../../reporting'
import { logger } from '../../logger'
import type { BaseArgs, MeasureArgs } from '../types'

export const measureCommand: CommandModule<BaseArgs, MeasureArgs> = {
  command: 'measure [files..]',
  describe: 'Build, run and measure the energy of workload files',
  builder: (yargs) => {
    return yargs
      .positional('files', {
        type: 'string',
        array: true,
        describe: 'Workload files or directories (default: workloads from the config file)',
      })
      .option('trials', {
        alias: 'n',
        type: 'number',
        describe: 'Trials per workload',
      })
      .option('timeout', {
        type: 'number',
        describe: 'Wall-clock limit per execution in milliseconds',
      })
      .option('warmup-discard', {
        type: 'number',
        describe: 'Leading trials excluded from statistics',
      })
      .option('iterations', {
        type: 'number',
        describe: 'Run each workload this many times inside one sampling window',
      })
      .option('build-concurrency', {
        type: 'number',
        describe: 'Maximum concurrent builds',
      })
      .option('sampler', {
        type: 'string',
        choices: ['powercap', 'none'] as const,
        describe: 'Energy sampler (none validates outputs without measuring)',
      })
      .option('output-dir', {
        alias: 'o',
        type: 'string',
        describe: 'Directory for file reports',
      })
      .option('format', {
        alias: 'f',
        type: 'string',
        array: true,
        choices: ['cli', 'json', 'csv'] as const,
        describe: 'Report formats',
      })
      .option('cooldown', {
        type: 'number',
        describe: 'Pause between trials in milliseconds',
      })
      .option('niceness', {
        type: 'number',
        describe: 'Run measured executions under nice -n with this value (-20 needs privileges)',
      })
      .option('shuffle', {
        type: 'boolean',
        describe: 'Randomise workload order',
      })
      .option('keep-builds', {
        type: 'boolean',
        describe: 'Keep build directories after the run',
      })
      .option('include-trials', {
        type: 'boolean',
        describe: 'Include raw trials in the JSON report',
      })
      .example('$0 measure workloads/', 'Measure every workload file under workloads/')
      .example('$0 measure fib.yml --trials 10 --format json csv', 'Ten trials, file reports only')
      .example('$0 measure fib.yml --sampler none', 'Check outputs on a machine without RAPL')
  },
  handler: async (argv) => {
    try {
      const summary = await runMeasurement(argv)
      if (summary.cancelled) {
        process.exitCode = 130
      } else if (summary.failedSpecs.length > 0) {
        process.exitCode = 1
      }
    } catch (error) {
      reportError(error)
      process.exit(1)
    }
  },
}

/**
 * Map CLI flags onto config keys; unset flags leave the file and env values alone
 */
export function toConfigOverrides(args: MeasureArgs): Record<string, unknown> {
  const overrides: Record<string, unknown> = {}
  const output: Record<string, unknown> = {}

  if (args.files && args.files.length > 0) overrides.workloads = args.files
  if (args.trials !== undefined) overrides.trials = args.trials
  if (args.timeout !== undefined) overrides.timeout = args.timeout
  if (args.warmupDiscard !== undefined) overrides.warmupDiscard = args.warmupDiscard
  if (args.buildConcurrency !== undefined) overrides.buildConcurrency = args.buildConcurrency
  if (args.cooldown !== undefined) overrides.cooldownMs = args.cooldown
  if (args.niceness !== undefined) overrides.niceness = args.niceness
  if (args.shuffle !== undefined) overrides.shuffle = args.shuffle
  if (args.keepBuilds !== undefined) overrides.keepBuilds = args.keepBuilds
  if (args.iterations !== undefined) {
    overrides.measurement = { mode: 'iteration-aware', iterations: args.iterations }
  }
  if (args.sampler !== undefined) overrides.sampler = { type: args.sampler }

  if (args.outputDir !== undefined) output.dir = args.outputDir
  if (args.format !== undefined) output.formats = args.format
  if (args.includeTrials !== undefined) output.includeTrials = args.includeTrials
  if (Object.keys(output).length > 0) overrides.output = output

  return overrides
}

async function runMeasurement(args: MeasureArgs): Promise<HarnessRunSummary> {
  logger.info('Loading configuration...')
  const config = await loadConfig({
    configPath: args.config,
    cliArgs: toConfigOverrides(args),
  })

  if (config.workloads.length === 0) {
    throw new ConfigLoadError('No workload files given; pass files to measure or set "workloads" in the config')
  }

  const harness = createHarness(config)
  const controller = new AbortController()

  const onSigint = () => {
    if (controller.signal.aborted) {
      logger.warn('Received second SIGINT, exiting')
      process.exit(130)
    }
    logger.info('Received SIGINT, finishing the current trial...')
    controller.abort()
  }
  process.on('SIGINT', onSigint)

  try {
    setupProgressHandlers(harness, config, args.quiet)

    const summary = await harness.run({ signal: controller.signal })
    const trials = summary.summaries.flatMap((measurement) => harness.aggregator.trials(measurement.spec))

    if (args.quiet) {
      // In quiet mode, stdout carries the JSON summary only
      const formats = config.output.formats.filter((format) => format !== 'cli')
      await writeReports(summary, { ...config.output, formats }, { trials })
      console.log(new JSONReporter({ prettyPrint: true }).generate(summary))
    } else {
      await writeReports(summary, config.output, { trials })
    }

    return summary
  } finally {
    process.removeListener('SIGINT', onSigint)
  }
}

function reportError(error: unknown): void {
  if (error instanceof ConfigValidationError) {
    logger.error('Configuration validation failed:')
    logger.error(error.getErrorSummary())
  } else if (error instanceof ConfigLoadError) {
    logger.error(error.message)
  } else if (isHarnessError(error)) {
    logger.error(`Measurement run aborted (${error.kind}): ${error.message}`)
  } else {
    logger.error('Measurement run failed:', error)
  }
}

/**
 * Set up progress handlers for the harness
 */
function setupProgressHandlers(harness: Harness, config: HarnessConfig, quiet?: boolean): void {
  if (quiet) return

  harness.on('runStart', (specCount: number) => {
    logger.info(`Starting ${specCount} workload(s) with ${config.sampler.type} sampler`)
  })

  harness.on('specStart', (spec: WorkloadSpec) => {
    logger.info(`Measuring ${formatSpecRef(spec)}`)
  })

  harness.on('trialComplete', (trial: Trial) => {
    const energy = trial.energyJoules === undefined ? '-' : `${trial.energyJoules.toFixed(3)} J`
    logger.debug(`${trial.specKey} #${trial.index + 1}: ${trial.outcome} ${energy} ${trial.durationMs}ms`)
  })

  harness.on('specComplete', (summary: MeasurementSummary) => {
    const mean = summary.mean === null ? 'no samples' : `${summary.mean.toFixed(3)} J`
    logger.info(`Completed ${formatSpecRef(summary.spec)}: ${mean}, pass rate ${Math.round(summary.passRate * 100)}%`)
  })

  harness.on('specFailed', (spec: WorkloadSpec, error: Error) => {
    logger.error(`Failed ${formatSpecRef(spec)}: ${error.message}`)
  })

  harness.on('runComplete', (summary: HarnessRunSummary) => {
    logger.info(
      `Measurement completed: ${summary.summaries.length} measured, ${summary.failedSpecs.length} failed` +
        (summary.cancelled ? ' (cancelled)' : ''),
    )
  })
}
