import { EventEmitter } from 'events'
import type { HarnessConfig, HarnessRunSummary, MeasurementSummary, Trial, WorkloadSpec } from './types'
import { specKey } from './types'
import { BuildFailure, MeasurementUnavailable, toError } from './errors'
import { Scheduler, createScheduler } from './scheduler'
import { SpecRegistry } from '../registry'
import { Builder } from '../build'
import { EnvironmentRegistry, PathToolchainProbe, type ToolchainProbe } from '../environments'
import { createProcessRunner, type ProcessRunner } from '../process/process-runner'
import { SamplerGate, createSampler, type EnergySampler } from '../sampler'
import { TrialRunner, type TrialStateChange } from '../runner'
import { Aggregator } from '../aggregation'
import { ReportCollector } from '../reporting/report-collector'
import { logger } from '../logger'

export interface HarnessEvents {
  runStart: (specCount: number) => void
  specStart: (spec: WorkloadSpec) => void
  trialState: (change: TrialStateChange) => void
  trialComplete: (trial: Trial) => void
  specComplete: (summary: MeasurementSummary) => void
  specFailed: (spec: WorkloadSpec, error: Error) => void
  runComplete: (summary: HarnessRunSummary) => void
  runError: (error: Error) => void
}

/**
 * Replaceable collaborators; each defaults to the real implementation
 */
export interface HarnessDeps {
  registry?: SpecRegistry
  environments?: EnvironmentRegistry
  runner?: ProcessRunner
  sampler?: EnergySampler
  probe?: ToolchainProbe
  // Returns a value in [0, 1); used for shuffling spec order
  random?: () => number
}

export interface HarnessRunOptions {
  signal?: AbortSignal
  cwd?: string
}

interface SpecJob {
  id: string
  spec: WorkloadSpec
}

/**
 * Harness - loads specs, schedules one job per spec and runs its trials in
 * order. Spec-level failures end that spec only; MeasurementUnavailable ends
 * the run and is rethrown. Specs still building or queued on the gate at that
 * point never open a window.
 */
export class Harness extends EventEmitter {
  readonly registry: SpecRegistry
  readonly builder: Builder
  readonly gate: SamplerGate
  readonly aggregator: Aggregator
  private config: HarnessConfig
  private trialRunner: TrialRunner
  private scheduler: Scheduler<SpecJob, MeasurementSummary>
  private reportCollector: ReportCollector
  private random: () => number
  private fatalError: MeasurementUnavailable | null = null
  private cancelled = false

  constructor(config: HarnessConfig, deps: HarnessDeps = {}) {
    super()
    this.config = config
    this.random = deps.random ?? Math.random

    const environments = deps.environments ?? new EnvironmentRegistry()
    const runner = deps.runner ?? createProcessRunner()

    this.registry = deps.registry ?? new SpecRegistry()
    this.builder = new Builder(
      {
        workDir: config.workDir,
        buildConcurrency: config.buildConcurrency,
        buildTimeout: config.buildTimeout,
        killGraceMs: config.killGraceMs,
      },
      { environments, runner, probe: deps.probe ?? new PathToolchainProbe() },
    )
    this.gate = new SamplerGate(deps.sampler ?? createSampler(config.sampler))
    this.aggregator = new Aggregator({
      warmupDiscard: config.warmupDiscard,
      outlierIqrMultiplier: config.outlierIqrMultiplier,
      confidenceLevel: config.confidenceLevel,
    })
    this.trialRunner = new TrialRunner(
      {
        timeout: config.timeout,
        killGraceMs: config.killGraceMs,
        measurement: config.measurement,
        niceness: config.niceness,
      },
      { builder: this.builder, environments, gate: this.gate, runner, recorder: this.aggregator },
    )
    this.reportCollector = new ReportCollector()

    // Specs compete for the sampler gate; builds overlap with other specs' trials
    this.scheduler = createScheduler<SpecJob, MeasurementSummary>({ concurrency: config.buildConcurrency })
    this.scheduler.setJobHandler((job) => this.runSpec(job.spec))

    this.setupEventForwarding()
  }

  /**
   * Measures every spec from `config.workloads` plus any already in the registry
   */
  async run(options: HarnessRunOptions = {}): Promise<HarnessRunSummary> {
    const { signal } = options
    this.reportCollector.clear()
    this.fatalError = null
    this.cancelled = false
    this.gate.reset()

    const onAbort = () => {
      if (this.cancelled) return
      this.cancelled = true
      logger.warn('Cancellation requested, stopping after the current trial')
      this.scheduler.stop()
    }
    signal?.addEventListener('abort', onAbort)

    try {
      if (this.config.workloads.length > 0) {
        const { errors } = await this.registry.loadFilesEach(this.config.workloads, options.cwd)
        errors.forEach((error) => this.reportCollector.addFailure(error))
      }

      const specs = this.orderSpecs(this.registry.list())
      logger.info(`Measuring ${specs.length} workload(s), ${this.config.trials} trial(s) each`)
      this.emit('runStart', specs.length)

      if (signal?.aborted) {
        onAbort()
      }

      this.scheduler.addJobs(specs.map((spec) => ({ id: specKey(spec), spec })))
      const outcomes = await this.scheduler.run()

      outcomes.forEach(({ job, result, error }) => {
        if (result) {
          this.reportCollector.addSummary(result)
        } else if (error && error !== this.fatalError) {
          this.reportCollector.addFailure(error, job.spec)
        }
      })

      if (this.fatalError) {
        throw this.fatalError
      }

      if (this.cancelled) {
        this.reportCollector.markCancelled()
      }
      this.reportCollector.completeRun()
      const summary = this.reportCollector.getSummary()

      logger.info(
        `Run complete: ${summary.summaries.length} measured, ${summary.failedSpecs.length} failed` +
          (summary.cancelled ? ' (cancelled)' : ''),
      )
      this.emit('runComplete', summary)
      return summary
    } catch (error) {
      const runError = toError(error)
      logger.error('Harness run failed:', runError.message)
      this.emit('runError', runError)
      throw runError
    } finally {
      signal?.removeEventListener('abort', onAbort)
      if (!this.config.keepBuilds) {
        await this.builder.clean()
      }
    }
  }

  private async runSpec(spec: WorkloadSpec): Promise<MeasurementSummary> {
    this.aggregator.register(spec)
    this.emit('specStart', spec)

    for (let index = 0; index < this.config.trials; index++) {
      if (this.fatalError || this.cancelled) {
        break
      }

      let trial: Trial
      try {
        trial = await this.trialRunner.runTrial(spec, index)
      } catch (error) {
        if (error instanceof MeasurementUnavailable) {
          this.abortRun(error)
        }
        throw error
      }

      // A failed build would fail every remaining trial the same way
      if (trial.outcome === 'BuildFailure') {
        const artifact = await this.builder.build(spec)
        const ref = { name: spec.name, language: spec.language }
        throw artifact.failure?.forSpec(ref) ?? new BuildFailure(ref, trial.error ?? '', null)
      }

      if (this.config.cooldownMs > 0 && index < this.config.trials - 1 && !this.cancelled) {
        await sleep(this.config.cooldownMs)
      }
    }

    const summary = this.aggregator.snapshot(spec)
    this.emit('specComplete', summary)
    return summary
  }

  private abortRun(error: MeasurementUnavailable): void {
    if (this.fatalError) return
    this.fatalError = error
    logger.error(error.message)
    this.scheduler.stop()
  }

  private orderSpecs(specs: WorkloadSpec[]): WorkloadSpec[] {
    if (!this.config.shuffle) {
      return specs
    }

    const shuffled = [...specs]
    for (let i = shuffled.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1))
      const current = shuffled[i]
      const other = shuffled[j]
      if (current !== undefined && other !== undefined) {
        shuffled[i] = other
        shuffled[j] = current
      }
    }
    return shuffled
  }

  private setupEventForwarding(): void {
    this.trialRunner.on('state', (change: TrialStateChange) => this.emit('trialState', change))
    this.trialRunner.on('trial', (trial: Trial) => this.emit('trialComplete', trial))

    this.scheduler.on('jobFailed', (job: SpecJob, error: Error) => {
      if (error !== this.fatalError) {
        logger.warn(error.message)
      }
      this.emit('specFailed', job.spec, error)
    })
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function createHarness(config: HarnessConfig, deps?: HarnessDeps): Harness {
  return new Harness(config, deps)
}
