import { spawn, type ChildProcess } from 'child_process'
import type { ProcessResult } from '../core/types/execution'
import { logger } from '../logger'

export interface ProcessRequest {
  command: string
  argv: string[]
  cwd?: string
  env?: Record<string, string>
  stdin?: string
  timeoutMs: number
  // Time between SIGTERM and SIGKILL once the timeout fires
  killGraceMs?: number
}

/**
 * Process boundary used by environments (compilers) and the trial runner (workloads)
 */
export interface ProcessRunner {
  run(request: ProcessRequest): Promise<ProcessResult>
}

export class ProcessSpawnError extends Error {
  constructor(
    public readonly command: string,
    cause: Error,
  ) {
    super(`Failed to spawn ${command}: ${cause.message}`)
    this.name = 'ProcessSpawnError'
  }
}

const DEFAULT_KILL_GRACE_MS = 2000

/**
 * ChildProcessRunner - spawns argv directly (no shell), captures output and
 * enforces a wall-clock timeout.
 *
 * Each child leads its own process group so that a timeout also reaches any
 * grandchildren, and so that a terminal SIGINT is not delivered to the
 * workload mid-measurement.
 */
export class ChildProcessRunner implements ProcessRunner {
  private active = new Map<number, ChildProcess>()
  private exitHandlerInstalled = false

  async run(request: ProcessRequest): Promise<ProcessResult> {
    this.installExitHandler()

    const startTime = Date.now()
    const killGraceMs = request.killGraceMs ?? DEFAULT_KILL_GRACE_MS

    return new Promise<ProcessResult>((resolve, reject) => {
      let child: ChildProcess
      try {
        child = spawn(request.command, request.argv, {
          cwd: request.cwd,
          env: { ...process.env, ...request.env },
          stdio: ['pipe', 'pipe', 'pipe'],
          detached: true,
        })
      } catch (error) {
        reject(new ProcessSpawnError(request.command, error instanceof Error ? error : new Error(String(error))))
        return
      }

      const pid = child.pid
      if (pid !== undefined) {
        this.active.set(pid, child)
      }

      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let timedOut = false
      let killTimer: NodeJS.Timeout | undefined

      child.stdout?.on('data', (data: Buffer) => stdoutChunks.push(data))
      child.stderr?.on('data', (data: Buffer) => stderrChunks.push(data))

      // A workload that exits without reading stdin closes the pipe early
      child.stdin?.on('error', (error) => {
        logger.debug(`stdin of ${request.command} closed early: ${error.message}`)
      })
      child.stdin?.end(request.stdin ?? '')

      const timeout = setTimeout(() => {
        timedOut = true
        logger.warn(`${request.command} exceeded ${request.timeoutMs}ms, sending SIGTERM`)
        this.signal(child, 'SIGTERM')

        killTimer = setTimeout(() => {
          logger.warn(`${request.command} ignored SIGTERM, sending SIGKILL`)
          this.signal(child, 'SIGKILL')
        }, killGraceMs)
      }, request.timeoutMs)

      const settle = () => {
        clearTimeout(timeout)
        if (killTimer) clearTimeout(killTimer)
        if (pid !== undefined) this.active.delete(pid)
      }

      child.on('error', (error) => {
        settle()
        logger.error(`Failed to spawn ${request.command}:`, error.message)
        reject(new ProcessSpawnError(request.command, error))
      })

      child.on('close', (code, signal) => {
        settle()
        logger.debug(`${request.command} exited with code ${code} signal ${signal}`)

        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr: Buffer.concat(stderrChunks).toString('utf8'),
          timedOut,
          durationMs: Date.now() - startTime,
        })
      })
    })
  }

  getActiveCount(): number {
    return this.active.size
  }

  /**
   * Force-kill every process still running
   */
  killAll(): void {
    for (const child of this.active.values()) {
      this.signal(child, 'SIGKILL')
    }
    this.active.clear()
  }

  private signal(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid === undefined) return

    try {
      process.kill(-child.pid, signal)
    } catch {
      try {
        child.kill(signal)
      } catch (error) {
        logger.debug(`Could not signal process ${child.pid}: ${error instanceof Error ? error.message : String(error)}`)
      }
    }
  }

  private installExitHandler(): void {
    if (this.exitHandlerInstalled) return
    this.exitHandlerInstalled = true

    // Synchronous cleanup only
    process.once('exit', () => {
      this.killAll()
    })
  }
}

export function createProcessRunner(): ChildProcessRunner {
  return new ChildProcessRunner()
}
