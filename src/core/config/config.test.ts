import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { writeFile, mkdir, rm } from 'fs/promises'
import { join } from 'path'
import { loadConfig } from '.'
import { ConfigLoadError, ConfigValidationError } from './errors'

const testDir = join(__dirname, '../../../tmp/config-tests')

describe('Config loader', () => {
  beforeEach(async () => {
    await mkdir(testDir, { recursive: true })
  })

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true })
    } catch {
      // Ignore cleanup errors
    }
  })

  describe('loadConfig', () => {
    it('should load default config when no config file exists', async () => {
      const config = await loadConfig({ cwd: testDir })

      expect(config.workloads).toEqual([])
      expect(config.trials).toBe(5)
      expect(config.warmupDiscard).toBe(1)
      expect(config.outlierIqrMultiplier).toBe(1.5)
      expect(config.confidenceLevel).toBe(0.95)
      expect(config.measurement).toEqual({ mode: 'per-invocation' })
      expect(config.sampler.type).toBe('powercap')
      expect(config.output.formats).toEqual(['cli'])
    })

    it('should load and validate JSON config file', async () => {
      const configContent = {
        workloads: ['benchmarks/clbg'],
        trials: 10,
        sampler: { type: 'none' },
      }

      await writeFile(join(testDir, 'joulebench.config.json'), JSON.stringify(configContent, null, 2))

      const config = await loadConfig({ cwd: testDir })

      expect(config.workloads).toEqual(['benchmarks/clbg'])
      expect(config.trials).toBe(10)
      expect(config.sampler.type).toBe('none')
      expect(config.sampler.root).toBe('/sys/class/powercap')
    })

    it('should load JS config file', async () => {
      const configContent = `
        module.exports = {
          trials: 3,
          buildConcurrency: 4
        }
      `

      await writeFile(join(testDir, 'joulebench.config.js'), configContent)

      const config = await loadConfig({ cwd: testDir })

      expect(config.trials).toBe(3)
      expect(config.buildConcurrency).toBe(4)
    })

    it('should prefer explicit config path over discovery', async () => {
      await writeFile(join(testDir, 'joulebench.config.json'), JSON.stringify({ trials: 1 }))

      const customConfigPath = join(testDir, 'custom.config.json')
      await writeFile(customConfigPath, JSON.stringify({ trials: 7 }))

      const config = await loadConfig({
        cwd: testDir,
        configPath: 'custom.config.json',
      })

      expect(config.trials).toBe(7)
    })

    it('should throw ConfigLoadError for invalid JSON', async () => {
      await writeFile(join(testDir, 'joulebench.config.json'), 'invalid json')

      await expect(loadConfig({ cwd: testDir })).rejects.toThrow(ConfigLoadError)
    })

    it('should name the config file that failed to load', async () => {
      await writeFile(join(testDir, 'custom.json'), '[1, 2]')

      const error = await loadConfig({ cwd: testDir, configPath: 'custom.json' }).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(ConfigLoadError)
      if (error instanceof ConfigLoadError) {
        expect(error.configPath).toBe(join(testDir, 'custom.json'))
        expect(error.message).toBe(`Config file ${join(testDir, 'custom.json')} must export an object`)
      }
    })

    it('should keep the parse error as the cause', async () => {
      await writeFile(join(testDir, 'joulebench.config.json'), 'invalid json')

      const error = await loadConfig({ cwd: testDir }).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(ConfigLoadError)
      if (error instanceof ConfigLoadError) {
        expect(error.configPath).toBe(join(testDir, 'joulebench.config.json'))
        expect(error.cause).toMatchObject({ name: 'SyntaxError' })
      }
    })

    it('should apply environment variable overrides', async () => {
      process.env.JOULEBENCH_TRIALS = '4'
      process.env.JOULEBENCH_TIMEOUT = '60000'
      process.env.JOULEBENCH_SAMPLER = 'none'

      try {
        const config = await loadConfig({ cwd: testDir })

        expect(config.trials).toBe(4)
        expect(config.timeout).toBe(60000)
        expect(config.sampler.type).toBe('none')
      } finally {
        delete process.env.JOULEBENCH_TRIALS
        delete process.env.JOULEBENCH_TIMEOUT
        delete process.env.JOULEBENCH_SAMPLER
      }
    })

    it('should read a negative niceness from the environment', async () => {
      process.env.JOULEBENCH_NICENESS = '-10'

      try {
        const config = await loadConfig({ cwd: testDir })

        expect(config.niceness).toBe(-10)
      } finally {
        delete process.env.JOULEBENCH_NICENESS
      }
    })

    it('should apply CLI argument overrides with highest priority', async () => {
      await writeFile(join(testDir, 'joulebench.config.json'), JSON.stringify({ trials: 2 }))

      process.env.JOULEBENCH_TRIALS = '3'

      try {
        const config = await loadConfig({
          cwd: testDir,
          cliArgs: { trials: 9 },
        })

        expect(config.trials).toBe(9)
      } finally {
        delete process.env.JOULEBENCH_TRIALS
      }
    })

    it('should handle nested configuration merging', async () => {
      const fileConfig = {
        output: {
          dir: './file-results',
          formats: ['json'],
        },
      }

      await writeFile(join(testDir, 'joulebench.config.json'), JSON.stringify(fileConfig))

      const config = await loadConfig({
        cwd: testDir,
        cliArgs: {
          output: {
            formats: ['cli', 'csv'],
          },
        },
      })

      expect(config.output.dir).toBe('./file-results')
      expect(config.output.formats).toEqual(['cli', 'csv'])
    })

    it('should accept an iteration-aware measurement default', async () => {
      await writeFile(
        join(testDir, 'joulebench.config.json'),
        JSON.stringify({ measurement: { mode: 'iteration-aware', iterations: 10 } }),
      )

      const config = await loadConfig({ cwd: testDir })

      expect(config.measurement).toEqual({ mode: 'iteration-aware', iterations: 10 })
    })

    it('should reject an unsupported confidence level', async () => {
      await writeFile(join(testDir, 'joulebench.config.json'), JSON.stringify({ confidenceLevel: 0.8 }))

      await expect(loadConfig({ cwd: testDir })).rejects.toThrow(ConfigValidationError)
    })

    it('should summarise validation issues by path', async () => {
      await writeFile(join(testDir, 'joulebench.config.json'), JSON.stringify({ trials: 0 }))

      try {
        await loadConfig({ cwd: testDir })
        throw new Error('expected validation to fail')
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError)
        if (error instanceof ConfigValidationError) {
          expect(error.getErrorSummary()).toMatch(/^trials: /)
          expect(error.issues).toHaveLength(1)
          expect(error.message).toBe('Invalid configuration (1 issue)')
        }
      }
    })
  })
})
