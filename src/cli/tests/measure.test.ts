/* eslint-disable no-console */
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'
import { writeFile, mkdir, rm, readFile } from 'fs/promises'
import { join } from 'path'
import { runCli } from '../cli'
import { toConfigOverrides } from '../commands/measure'
import { logger } from '../../logger'
import type { HarnessConfig, ProcessResult } from '../../core/types'
import type { ProcessRequest } from '../../process/process-runner'

const TEST_DIR = join(__dirname, '../../../tmp/cli-measure-tests')

jest.mock('../../logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    setLevel: jest.fn(),
  },
}))

// Real harness with a runner that prints each script's source and a probe that finds node
jest.mock('../../core/harness', () => {
  const actual = jest.requireActual<typeof import('../../core/harness')>('../../core/harness')
  const { StaticToolchainProbe } = jest.requireActual<typeof import('../../environments')>('../../environments')
  const fs = jest.requireActual<typeof import('fs/promises')>('fs/promises')

  const runner = {
    async run(request: ProcessRequest): Promise<ProcessResult> {
      const script = request.argv[request.argv.length - 1] ?? ''
      const stdout = await fs.readFile(script, 'utf-8')
      return { exitCode: 0, signal: null, stdout, stderr: '', timedOut: false, durationMs: 12 }
    },
  }

  return {
    ...actual,
    createHarness: (config: HarnessConfig) =>
      new actual.Harness(config, { runner, probe: new StaticToolchainProbe(['node']) }),
  }
})

const workload = (name: string, code: string, expected: string) =>
  [
    'language: js',
    `name: ${name}`,
    `code: ${JSON.stringify(code)}`,
    `expected_stdout: ${JSON.stringify(expected)}`,
  ].join('\n')

const captureOutput = () => {
  const originalLog = console.log
  const originalError = console.error
  const logs: string[] = []

  console.log = (...args: unknown[]) => {
    logs.push(args.map(String).join(' '))
  }
  console.error = () => undefined

  return {
    getLogs: () => logs.join('\n'),
    restore: () => {
      console.log = originalLog
      console.error = originalError
    },
  }
}

describe('measure command', () => {
  const originalCwd = process.cwd()

  beforeEach(async () => {
    await mkdir(TEST_DIR, { recursive: true })
    await writeFile(join(TEST_DIR, 'joulebench.config.json'), JSON.stringify({ workDir: './work' }))
    await writeFile(join(TEST_DIR, 'fib.yml'), workload('fib', 'check: 5\n', 'check: 5\n'))
    process.chdir(TEST_DIR)
  })

  afterEach(async () => {
    process.chdir(originalCwd)
    process.exitCode = undefined
    jest.mocked(logger.error).mockClear()
    await rm(TEST_DIR, { recursive: true, force: true })
  })

  it('should measure workload files and write the requested reports', async () => {
    const capture = captureOutput()

    try {
      await runCli([
        'measure',
        'fib.yml',
        '--sampler',
        'none',
        '--trials',
        '2',
        '--format',
        'json',
        'csv',
        '-o',
        'out',
        '-q',
      ])

      const stdoutReport = JSON.parse(capture.getLogs())
      expect(stdoutReport.summaries.map((entry: { name: string }) => entry.name)).toEqual(['fib'])

      const report = JSON.parse(await readFile(join(TEST_DIR, 'out', 'summaries.json'), 'utf-8'))
      expect(report.summaries[0]).toMatchObject({ name: 'fib', language: 'js', trialCount: 2, passRate: 1 })
      expect(report.summaries[0].energy.mean).toBeNull()

      const csv = await readFile(join(TEST_DIR, 'out', 'summaries.csv'), 'utf-8')
      expect(csv.split('\n')[1]?.startsWith('fib,js,2,2,1,')).toBe(true)

      expect(process.exitCode).toBeUndefined()
    } finally {
      capture.restore()
    }
  })

  it('should record mismatching output without failing the spec', async () => {
    await writeFile(join(TEST_DIR, 'wrong.yml'), workload('wrong', 'check: 6\n', 'check: 5\n'))
    const capture = captureOutput()

    try {
      await runCli(['measure', 'wrong.yml', '--sampler', 'none', '--trials', '3', '--format', 'json', '-q'])

      const report = JSON.parse(capture.getLogs())
      expect(report.summaries[0]).toMatchObject({ name: 'wrong', passCount: 0, passRate: 0 })
      expect(report.failedSpecs).toEqual([])
    } finally {
      capture.restore()
    }
  })

  it('should set exit code 1 when a workload file is invalid', async () => {
    await writeFile(join(TEST_DIR, 'broken.yml'), 'language: js\nname: broken\n')
    const capture = captureOutput()

    try {
      await runCli(['measure', 'fib.yml', 'broken.yml', '--sampler', 'none', '--trials', '1', '-f', 'json', '-q'])

      const report = JSON.parse(capture.getLogs())
      expect(report.summaries).toHaveLength(1)
      expect(report.failedSpecs).toHaveLength(1)
      expect(report.failedSpecs[0]).toMatchObject({ kind: 'SpecParseError', origin: join(TEST_DIR, 'broken.yml') })
      expect(process.exitCode).toBe(1)
    } finally {
      capture.restore()
    }
  })

  it('should exit with error when no workloads are given', async () => {
    const mockExit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called')
    })

    try {
      await expect(runCli(['measure', '--sampler', 'none'])).rejects.toThrow('process.exit called')

      expect(mockExit).toHaveBeenCalledWith(1)
      expect(logger.error).toHaveBeenCalledWith(
        'No workload files given; pass files to measure or set "workloads" in the config',
      )
    } finally {
      mockExit.mockRestore()
    }
  })
})

describe('toConfigOverrides', () => {
  it('should leave unset flags out', () => {
    expect(toConfigOverrides({})).toEqual({})
  })

  it('should map flags onto nested config keys', () => {
    expect(
      toConfigOverrides({
        files: ['a.yml'],
        trials: 10,
        warmupDiscard: 2,
        iterations: 50,
        sampler: 'none',
        cooldown: 500,
        niceness: -5,
        outputDir: 'results',
        format: ['json'],
      }),
    ).toEqual({
      workloads: ['a.yml'],
      trials: 10,
      warmupDiscard: 2,
      measurement: { mode: 'iteration-aware', iterations: 50 },
      sampler: { type: 'none' },
      cooldownMs: 500,
      niceness: -5,
      output: { dir: 'results', formats: ['json'] },
    })
  })
})
