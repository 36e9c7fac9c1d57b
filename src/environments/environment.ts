import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { BuildArtifact, ExecutableHandle, RunCommand, WorkloadSpec } from '../core/types'
import { BuildFailure, MissingDependency, toError } from '../core/errors'
import type { ProcessRunner } from '../process/process-runner'
import type { ToolchainProbe } from './toolchain-probe'
import packageCommands from './package-commands.json'
import { logger } from '../logger'

export interface CompileContext {
  contentHash: string
  timeoutMs: number
  killGraceMs?: number
}

/**
 * Capability set of one language toolchain
 */
export interface Environment {
  readonly id: string
  readonly aliases: readonly string[]
  // Commands this environment itself needs on the host
  readonly toolchain: readonly string[]
  resolveDependencies(spec: WorkloadSpec, probe: ToolchainProbe): Promise<string[]>
  compile(spec: WorkloadSpec, workdir: string, runner: ProcessRunner, context: CompileContext): Promise<BuildArtifact>
  runCommand(artifact: BuildArtifact, args: readonly string[]): RunCommand
}

export interface BuildStep {
  command: string
  argv: string[]
}

// Package name -> command it provides; null for libraries with nothing to probe
const PACKAGE_COMMANDS = new Map<string, string | null>(Object.entries(packageCommands))

/**
 * Command a dependency is probed by; unknown names are taken as commands
 */
export function commandForPackage(name: string): string | null {
  const mapped = PACKAGE_COMMANDS.get(name)
  return mapped === undefined ? name : mapped
}

/**
 * Shared pipeline: write sources, run each build step, hand back an
 * executable. Subclasses describe files, steps and how to launch the result.
 */
export abstract class SourceEnvironment implements Environment {
  abstract readonly id: string
  abstract readonly aliases: readonly string[]
  abstract readonly toolchain: readonly string[]
  protected abstract readonly sourceFile: string

  protected abstract buildSteps(spec: WorkloadSpec, workdir: string): BuildStep[]
  protected abstract executable(spec: WorkloadSpec, workdir: string): ExecutableHandle

  // Extra files next to the source, keyed by file name
  protected projectFiles(_spec: WorkloadSpec): Record<string, string> {
    return {}
  }

  async resolveDependencies(spec: WorkloadSpec, probe: ToolchainProbe): Promise<string[]> {
    const components = Array.from(new Set([...this.toolchain, ...spec.dependencies]))
    const missing: string[] = []

    for (const component of components) {
      const command = commandForPackage(component)
      if (command === null) {
        logger.debug(`${component} is a library, not probing`)
        continue
      }
      if (!(await probe.has(command))) {
        missing.push(component)
      }
    }

    if (missing.length > 0) {
      throw new MissingDependency({ name: spec.name, language: spec.language }, missing)
    }
    return components
  }

  async compile(
    spec: WorkloadSpec,
    workdir: string,
    runner: ProcessRunner,
    context: CompileContext,
  ): Promise<BuildArtifact> {
    await mkdir(workdir, { recursive: true })
    await writeFile(join(workdir, this.sourceFile), spec.code)
    for (const [fileName, content] of Object.entries(this.projectFiles(spec))) {
      await writeFile(join(workdir, fileName), content)
    }

    const artifact = {
      spec,
      contentHash: context.contentHash,
      environment: this.id,
      workdir,
    }
    const ref = { name: spec.name, language: spec.language }
    const log: string[] = []

    for (const step of this.buildSteps(spec, workdir)) {
      logger.debug(`[${spec.name}] ${step.command} ${step.argv.join(' ')}`)

      let failure: BuildFailure | undefined
      try {
        const result = await runner.run({
          command: step.command,
          argv: step.argv,
          cwd: workdir,
          timeoutMs: context.timeoutMs,
          killGraceMs: context.killGraceMs,
        })
        log.push(result.stdout, result.stderr)

        if (result.timedOut) {
          const reason = `${step.command} timed out after ${context.timeoutMs}ms\n${result.stderr}`
          failure = new BuildFailure(ref, reason, null)
        } else if (result.exitCode !== 0) {
          failure = new BuildFailure(ref, result.stderr || result.stdout, result.exitCode)
        }
      } catch (error) {
        failure = new BuildFailure(ref, toError(error).message, null)
      }

      if (failure) {
        return { ...artifact, buildLog: log.join(''), status: 'failed', failure }
      }
    }

    return {
      ...artifact,
      buildLog: log.join(''),
      status: 'built',
      executable: this.executable(spec, workdir),
      builtAt: new Date(),
    }
  }

  runCommand(artifact: BuildArtifact, args: readonly string[]): RunCommand {
    if (artifact.status !== 'built' || !artifact.executable) {
      throw new Error(`Artifact ${artifact.contentHash} of ${artifact.spec.name} was not built`)
    }

    return {
      command: artifact.executable.path,
      argv: [...artifact.executable.argv, ...args],
      cwd: artifact.workdir,
      env: {},
    }
  }
}
