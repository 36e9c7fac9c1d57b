import { EventEmitter } from 'events'
import type {
  BuildArtifact,
  MeasurementMode,
  ProcessResult,
  RunCommand,
  SamplerReading,
  Trial,
  TrialState,
  WorkloadSpec,
} from '../core/types'
import { specKey } from '../core/types'
import { NonZeroExit, OutputMismatch, TrialTimeout, toError, type SpecRef } from '../core/errors'
import { compareOutput, normalizeOutput } from '../core/utils/normalize-output'
import type { EnvironmentRegistry } from '../environments'
import type { ProcessRunner } from '../process/process-runner'
import type { SamplerGate } from '../sampler'
import { logger } from '../logger'

export interface TrialRunnerOptions {
  timeout: number
  killGraceMs?: number
  // Applied to specs that do not choose a mode themselves
  measurement: MeasurementMode
  niceness?: number
}

export interface ArtifactSource {
  build(spec: WorkloadSpec): Promise<BuildArtifact>
}

export interface TrialRecorder {
  record(trial: Trial): void
}

export interface TrialRunnerDeps {
  builder: ArtifactSource
  environments: EnvironmentRegistry
  gate: SamplerGate
  runner: ProcessRunner
  recorder: TrialRecorder
}

export interface TrialStateChange {
  specKey: string
  index: number
  state: TrialState
}

export interface TrialRunnerEvents {
  state: (change: TrialStateChange) => void
  trial: (trial: Trial) => void
}

// Environment variables through which workloads learn their in-process repeat count
export const ITERATION_ENV_VARS = ['JOULEBENCH_ITERATIONS', 'RAPL_ITERATIONS']

/**
 * Runs `command` under `nice -n <niceness>`; a zero or absent niceness leaves it as is
 */
export function withNiceness(command: RunCommand, niceness: number | undefined): RunCommand {
  if (!niceness) {
    return command
  }
  return { ...command, command: 'nice', argv: ['-n', String(niceness), command.command, ...command.argv] }
}

interface Execution {
  result: ProcessResult
  startTime: Date
  endTime: Date
}

/**
 * TrialRunner - one trial per call:
 * Idle -> Building -> SamplerAcquire -> Executing -> Validating -> Recorded -> SamplerRelease
 *
 * The sampling window closes as soon as the process exits; validation and
 * recording happen while the gate is still held.
 */
export class TrialRunner extends EventEmitter {
  constructor(
    private options: TrialRunnerOptions,
    private deps: TrialRunnerDeps,
  ) {
    super()
  }

  /**
   * Runs and records one trial. Throws MissingDependency when the toolchain
   * is absent and MeasurementUnavailable when the sampler fails.
   */
  async runTrial(spec: WorkloadSpec, index: number): Promise<Trial> {
    const key = specKey(spec)
    const ref: SpecRef = { name: spec.name, language: spec.language }
    const transition = (state: TrialState) => this.emit('state', { specKey: key, index, state })

    transition('Idle')
    transition('Building')
    const artifact = await this.deps.builder.build(spec)
    const iterations = this.iterationsFor(spec)

    if (artifact.status !== 'built') {
      const now = new Date()
      return this.record(transition, {
        specKey: key,
        artifactHash: artifact.contentHash,
        index,
        iterations,
        startTime: now,
        endTime: now,
        durationMs: 0,
        exitCode: null,
        capturedStdout: '',
        outcome: 'BuildFailure',
        error: artifact.failure?.forSpec(ref).message ?? 'build failed',
      })
    }

    const environment = this.deps.environments.getEnvironment(spec.language)
    const command = withNiceness(environment.runCommand(artifact, spec.args), spec.niceness ?? this.options.niceness)
    const env = { ...command.env }
    ITERATION_ENV_VARS.forEach((name) => {
      env[name] = String(iterations)
    })

    transition('SamplerAcquire')
    const trial = await this.deps.gate.withWindow(ref, async (window) => {
      transition('Executing')
      const execution = await this.execute(spec, { ...command, env })

      let reading: SamplerReading
      try {
        reading = await window.close()
      } catch (error) {
        this.record(transition, {
          ...this.baseTrial(key, artifact, index, iterations, execution),
          outcome: 'MeasurementUnavailable',
          error: toError(error).message,
        })
        throw error
      }

      transition('Validating')
      const classified = this.classify(spec, ref, execution.result, iterations)

      return this.record(transition, {
        ...this.baseTrial(key, artifact, index, iterations, execution),
        energyJoules: reading.energyJoules,
        ...classified,
      })
    })
    transition('SamplerRelease')

    return trial
  }

  iterationsFor(spec: WorkloadSpec): number {
    const mode = spec.measurement ?? this.options.measurement
    return mode.mode === 'iteration-aware' ? mode.iterations : 1
  }

  /**
   * Oracle for one trial: the expected stdout once per in-process iteration
   */
  expectedOutput(spec: WorkloadSpec, iterations: number): string {
    const single = normalizeOutput(spec.expectedStdout)
    if (iterations === 1 || single === '') {
      return single
    }
    return Array.from({ length: iterations }, () => single).join('\n')
  }

  private async execute(
    spec: WorkloadSpec,
    command: RunCommand,
  ): Promise<Execution> {
    const startTime = new Date()
    let result: ProcessResult
    try {
      result = await this.deps.runner.run({
        command: command.command,
        argv: command.argv,
        cwd: command.cwd,
        env: command.env,
        stdin: spec.stdin,
        timeoutMs: this.options.timeout,
        killGraceMs: this.options.killGraceMs,
      })
    } catch (error) {
      // Launch failures are classified like a process that exited abnormally
      result = {
        exitCode: null,
        signal: null,
        stdout: '',
        stderr: toError(error).message,
        timedOut: false,
        durationMs: Date.now() - startTime.getTime(),
      }
    }
    return { result, startTime, endTime: new Date() }
  }

  private classify(
    spec: WorkloadSpec,
    ref: SpecRef,
    result: ProcessResult,
    iterations: number,
  ): Pick<Trial, 'outcome' | 'mismatch' | 'error'> {
    if (result.timedOut) {
      return { outcome: 'Timeout', error: new TrialTimeout(ref, this.options.timeout).message }
    }

    if (result.exitCode !== 0) {
      return { outcome: 'NonZeroExit', error: new NonZeroExit(ref, result.exitCode, result.stderr).message }
    }

    const mismatch = compareOutput(this.expectedOutput(spec, iterations), result.stdout)
    if (mismatch) {
      const error = new OutputMismatch(ref, mismatch.line, mismatch.expected, mismatch.actual)
      return { outcome: 'OutputMismatch', mismatch, error: error.message }
    }

    return { outcome: 'Pass' }
  }

  private baseTrial(
    key: string,
    artifact: BuildArtifact,
    index: number,
    iterations: number,
    execution: Execution,
  ): Omit<Trial, 'outcome'> {
    return {
      specKey: key,
      artifactHash: artifact.contentHash,
      index,
      iterations,
      startTime: execution.startTime,
      endTime: execution.endTime,
      durationMs: execution.result.durationMs,
      exitCode: execution.result.exitCode,
      capturedStdout: execution.result.stdout,
    }
  }

  private record(transition: (state: TrialState) => void, trial: Trial): Trial {
    const frozen = Object.freeze({ ...trial, mismatch: trial.mismatch && Object.freeze({ ...trial.mismatch }) })
    this.deps.recorder.record(frozen)
    transition('Recorded')

    if (frozen.outcome !== 'Pass') {
      logger.debug(`${frozen.specKey}#${frozen.index}: ${frozen.outcome}${frozen.error ? ` (${frozen.error})` : ''}`)
    }
    this.emit('trial', frozen)
    return frozen
  }
}

