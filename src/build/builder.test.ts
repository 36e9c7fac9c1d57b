import { describe, it, expect, jest, afterEach } from '@jest/globals'
import { mkdir, rm, stat } from 'fs/promises'
import { join } from 'path'
import type { BuildArtifact, ProcessResult, RunCommand, WorkloadSpec } from '../core/types'
import { BuildFailure, MissingDependency } from '../core/errors'
import { EnvironmentRegistry, StaticToolchainProbe, type Environment, type ToolchainProbe } from '../environments'
import type { ProcessRunner } from '../process/process-runner'
import { Builder } from './builder'

jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

const workDir = join(__dirname, '../../tmp/builder-tests')

class FakeEnvironment implements Environment {
  readonly id = 'fake'
  readonly aliases = ['fake', 'fk']
  readonly toolchain = ['fakecc']
  compiles = 0
  failNext = false

  async resolveDependencies(spec: WorkloadSpec, probe: ToolchainProbe): Promise<string[]> {
    if (!(await probe.has('fakecc'))) {
      throw new MissingDependency({ name: spec.name, language: spec.language }, ['fakecc'])
    }
    return ['fakecc']
  }

  async compile(
    spec: WorkloadSpec,
    workdir: string,
    _runner: ProcessRunner,
    context: { contentHash: string },
  ): Promise<BuildArtifact> {
    this.compiles++
    await mkdir(workdir, { recursive: true })
    await new Promise<void>((resolve) => setTimeout(resolve, 20))

    const base = { spec, contentHash: context.contentHash, environment: this.id, workdir, buildLog: '' }
    if (this.failNext) {
      const failure = new BuildFailure({ name: spec.name, language: spec.language }, 'syntax error', 1)
      return { ...base, status: 'failed', failure }
    }
    return { ...base, status: 'built', executable: { path: join(workdir, 'main'), argv: [] } }
  }

  runCommand(artifact: BuildArtifact, args: readonly string[]): RunCommand {
    return { command: join(artifact.workdir, 'main'), argv: [...args], cwd: artifact.workdir, env: {} }
  }
}

const unusedRunner: ProcessRunner = {
  run: async (): Promise<ProcessResult> => {
    throw new Error('not expected')
  },
}

function makeSpec(overrides: Partial<WorkloadSpec> = {}): WorkloadSpec {
  return {
    name: 'fib',
    language: 'fake',
    code: 'main() {}',
    dependencies: [],
    options: [],
    args: [],
    expectedStdout: '',
    origin: 'inline',
    ...overrides,
  }
}

function createBuilder(environment: FakeEnvironment, available: string[] = ['fakecc'], buildConcurrency = 2) {
  return new Builder(
    { workDir, buildConcurrency, buildTimeout: 1000 },
    {
      environments: new EnvironmentRegistry([environment]),
      runner: unusedRunner,
      probe: new StaticToolchainProbe(available),
    },
  )
}

describe('Builder', () => {
  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  it('should collapse concurrent identical builds into one compile', async () => {
    const environment = new FakeEnvironment()
    const builder = createBuilder(environment)
    const spec = makeSpec()

    const artifacts = await Promise.all([1, 2, 3, 4, 5].map(() => builder.build(spec)))

    expect(environment.compiles).toBe(1)
    expect(new Set(artifacts).size).toBe(1)
    expect(builder.stats()).toEqual({ compiles: 1, cacheHits: 4, failures: 0, cached: 1 })
  })

  it('should not rebuild an unchanged spec', async () => {
    const environment = new FakeEnvironment()
    const builder = createBuilder(environment)

    await builder.build(makeSpec())
    await builder.build(makeSpec({ name: 'renamed', language: 'FK' }))

    expect(environment.compiles).toBe(1)
  })

  it('should build again when the code or options change', async () => {
    const environment = new FakeEnvironment()
    const builder = createBuilder(environment)

    await builder.build(makeSpec())
    await builder.build(makeSpec({ code: 'main() { return 1 }' }))
    await builder.build(makeSpec({ options: ['-O3'] }))

    expect(environment.compiles).toBe(3)
  })

  it('should cache failed builds', async () => {
    const environment = new FakeEnvironment()
    environment.failNext = true
    const builder = createBuilder(environment)

    const first = await builder.build(makeSpec())
    const second = await builder.build(makeSpec())

    expect(first.status).toBe('failed')
    expect(second).toBe(first)
    expect(environment.compiles).toBe(1)
    expect(builder.stats().failures).toBe(1)
  })

  it('should not cache missing dependencies', async () => {
    const environment = new FakeEnvironment()
    const builder = createBuilder(environment, [])

    await expect(builder.build(makeSpec())).rejects.toThrow(MissingDependency)
    await expect(builder.build(makeSpec())).rejects.toThrow(MissingDependency)

    expect(environment.compiles).toBe(0)
    expect(builder.stats().cached).toBe(0)
  })

  it('should reject languages without an environment', async () => {
    const builder = createBuilder(new FakeEnvironment())

    await expect(builder.build(makeSpec({ language: 'cobol' }))).rejects.toThrow(
      'missing toolchain component(s): environment for "cobol"',
    )
  })

  it('should limit the number of builds running at once', async () => {
    const environment = new FakeEnvironment()
    let running = 0
    let peak = 0
    const compile = environment.compile.bind(environment)
    environment.compile = async (...args) => {
      running++
      peak = Math.max(peak, running)
      try {
        return await compile(...args)
      } finally {
        running--
      }
    }
    const builder = createBuilder(environment, ['fakecc'], 2)

    await Promise.all(['a', 'b', 'c', 'd', 'e'].map((code) => builder.build(makeSpec({ code }))))

    expect(environment.compiles).toBe(5)
    expect(peak).toBe(2)
  })

  it('should remove build directories on clean', async () => {
    const builder = createBuilder(new FakeEnvironment())
    const artifact = await builder.build(makeSpec())

    await builder.clean()

    await expect(stat(artifact.workdir)).rejects.toThrow()
    expect(builder.stats().cached).toBe(0)
  })
})
