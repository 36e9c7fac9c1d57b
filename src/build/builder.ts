import { rm } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { BuildArtifact, WorkloadSpec } from '../core/types'
import { MissingDependency } from '../core/errors'
import { contentHash } from '../core/utils/content-hash'
import { Semaphore } from '../core/utils/semaphore'
import type { Environment, EnvironmentRegistry, ToolchainProbe } from '../environments'
import type { ProcessRunner } from '../process/process-runner'
import { logger } from '../logger'

export interface BuilderOptions {
  workDir: string
  buildConcurrency: number
  buildTimeout: number
  killGraceMs?: number
}

export interface BuilderDeps {
  environments: EnvironmentRegistry
  runner: ProcessRunner
  probe: ToolchainProbe
}

export interface BuildStats {
  compiles: number
  cacheHits: number
  failures: number
  cached: number
}

/**
 * Builder - content-hash cache of build artifacts.
 *
 * The cache holds promises, so a request for a hash that is already building
 * joins the pending build. Failed builds stay cached; MissingDependency and
 * unexpected errors are evicted.
 */
export class Builder {
  private cache = new Map<string, Promise<BuildArtifact>>()
  private pool: Semaphore
  private workdirs = new Set<string>()
  private counters = { compiles: 0, cacheHits: 0, failures: 0 }

  constructor(
    private options: BuilderOptions,
    private deps: BuilderDeps,
  ) {
    this.pool = new Semaphore(options.buildConcurrency)
  }

  build(spec: WorkloadSpec): Promise<BuildArtifact> {
    const environment = this.deps.environments.find(spec.language)
    if (!environment) {
      return Promise.reject(
        new MissingDependency({ name: spec.name, language: spec.language }, [`environment for "${spec.language}"`]),
      )
    }

    const hash = contentHash(spec, environment.id)
    const cached = this.cache.get(hash)
    if (cached) {
      this.counters.cacheHits++
      logger.debug(`[${spec.name}] reusing build ${hash.slice(0, 12)}`)
      return cached
    }

    const pending = this.pool
      .use(() => this.compile(spec, environment, hash))
      .catch((error: unknown) => {
        this.cache.delete(hash)
        throw error
      })
    this.cache.set(hash, pending)
    return pending
  }

  /**
   * Removes every build directory created by this builder and empties the cache
   */
  async clean(): Promise<void> {
    const dirs = Array.from(this.workdirs)
    this.workdirs.clear()
    this.cache.clear()

    await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })))
    logger.debug(`Removed ${dirs.length} build director${dirs.length === 1 ? 'y' : 'ies'}`)
  }

  stats(): BuildStats {
    return { ...this.counters, cached: this.cache.size }
  }

  private async compile(spec: WorkloadSpec, environment: Environment, hash: string): Promise<BuildArtifact> {
    await environment.resolveDependencies(spec, this.deps.probe)

    const workdir = resolve(this.options.workDir, 'builds', `${environment.id}-${hash.slice(0, 16)}`)
    this.workdirs.add(workdir)
    this.counters.compiles++

    logger.info(`Building ${spec.name} (${environment.id})`)
    const artifact = await environment.compile(spec, workdir, this.deps.runner, {
      contentHash: hash,
      timeoutMs: this.options.buildTimeout,
      killGraceMs: this.options.killGraceMs,
    })

    if (artifact.status === 'failed') {
      this.counters.failures++
      logger.warn(artifact.failure?.message ?? `Build of ${spec.name} failed`)
    }

    return artifact
  }
}

