import { access, constants } from 'node:fs/promises'
import { delimiter, isAbsolute, join } from 'node:path'

/**
 * Answers whether a toolchain command can be launched on this host
 */
export interface ToolchainProbe {
  has(command: string): Promise<boolean>
}

/**
 * Looks commands up on PATH, caching each answer for the life of the probe
 */
export class PathToolchainProbe implements ToolchainProbe {
  private cache = new Map<string, Promise<boolean>>()

  constructor(private searchPath: string = process.env.PATH ?? '') {}

  has(command: string): Promise<boolean> {
    let pending = this.cache.get(command)
    if (!pending) {
      pending = this.lookup(command)
      this.cache.set(command, pending)
    }
    return pending
  }

  private async lookup(command: string): Promise<boolean> {
    if (isAbsolute(command)) {
      return isExecutable(command)
    }

    const dirs = this.searchPath.split(delimiter).filter((dir) => dir.length > 0)
    for (const dir of dirs) {
      if (await isExecutable(join(dir, command))) {
        return true
      }
    }
    return false
  }
}

/**
 * Fixed set of available commands
 */
export class StaticToolchainProbe implements ToolchainProbe {
  private commands: Set<string>

  constructor(commands: Iterable<string>) {
    this.commands = new Set(commands)
  }

  async has(command: string): Promise<boolean> {
    return this.commands.has(command)
  }
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}
