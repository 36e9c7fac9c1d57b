import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals'
import { mkdir, readFile, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { measure, loadWorkloads, resolveConfig } from '.'
import { ConfigValidationError, SpecParseError, type ProcessResult, type SamplerReading, type Trial } from './core'
import { StaticToolchainProbe } from './environments'
import type { ProcessRequest, ProcessRunner } from './process/process-runner'
import type { EnergySampler } from './sampler'

jest.mock('./logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

const testDir = join(__dirname, '../tmp/api-tests')

class EchoRunner implements ProcessRunner {
  async run(request: ProcessRequest): Promise<ProcessResult> {
    const stdout = await readFile(request.argv[request.argv.length - 1] ?? '', 'utf-8')
    return { exitCode: 0, signal: null, stdout, stderr: '', timedOut: false, durationMs: 20 }
  }
}

class FixedSampler implements EnergySampler {
  readonly name = 'fixed'

  async start(): Promise<boolean> {
    return true
  }

  async stop(): Promise<SamplerReading> {
    return { energyJoules: 2 }
  }
}

describe('joulebench API', () => {
  beforeEach(async () => {
    await mkdir(testDir, { recursive: true })
    await writeFile(
      join(testDir, 'fib.yml'),
      ['language: js', 'name: fib', 'code: "check: 5\\n"', 'expected_stdout: "check: 5\\n"'].join('\n'),
    )
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  describe('measure', () => {
    it('should measure workload files and report progress through callbacks', async () => {
      const onStart = jest.fn()
      const trials: Trial[] = []
      const onComplete = jest.fn()

      const summary = await measure({
        workloads: 'fib.yml',
        cwd: testDir,
        trials: 4,
        warmupDiscard: 1,
        workDir: join(testDir, 'work'),
        deps: { runner: new EchoRunner(), sampler: new FixedSampler(), probe: new StaticToolchainProbe(['node']) },
        onStart,
        onTrialComplete: (trial) => trials.push(trial),
        onComplete,
      })

      expect(onStart).toHaveBeenCalledWith(1)
      expect(trials.map((trial) => trial.outcome)).toEqual(['Pass', 'Pass', 'Pass', 'Pass'])
      expect(onComplete).toHaveBeenCalledWith(summary)

      expect(summary.failedSpecs).toEqual([])
      expect(summary.summaries).toHaveLength(1)
      expect(summary.summaries[0]).toMatchObject({
        spec: { name: 'fib', language: 'js' },
        sampleCount: 3,
        mean: 2,
        stddev: 0,
        passRate: 1,
        warmupDiscarded: 1,
      })
      expect(summary.summaries[0]?.duration.mean).toBe(20)
    })
  })

  describe('resolveConfig', () => {
    it('should apply defaults and wrap a single workload path', () => {
      const config = resolveConfig({ workloads: 'bench.yml', trials: 3 })

      expect(config.workloads).toEqual(['bench.yml'])
      expect(config.trials).toBe(3)
      expect(config.sampler.type).toBe('powercap')
    })

    it('should reject invalid options', () => {
      expect(() => resolveConfig({ trials: 0 })).toThrow(ConfigValidationError)
    })
  })

  describe('loadWorkloads', () => {
    it('should return valid specs and report invalid files', async () => {
      await writeFile(join(testDir, 'broken.yml'), 'name: broken\n')

      const { loaded, errors } = await loadWorkloads(testDir)

      expect(loaded.map((spec) => spec.name)).toEqual(['fib'])
      expect(errors).toHaveLength(1)
      expect(errors[0]).toBeInstanceOf(SpecParseError)
      expect(errors[0]?.origin).toBe(join(testDir, 'broken.yml'))
    })
  })
})
