import { readFile, readdir, stat } from 'node:fs/promises'
import { extname, join, resolve } from 'node:path'
import { SpecParseError, toError } from '../core/errors'

export const WORKLOAD_EXTENSIONS = ['.yml', '.yaml', '.json']

export interface TextSource {
  origin: string
  content: string
}

export interface ParsedSource {
  origin: string
  data: unknown
}

export type WorkloadSourceInput = TextSource | ParsedSource

export interface ReadResult {
  sources: TextSource[]
  errors: SpecParseError[]
}

/**
 * Expands files and directories into workload file paths. Directories are
 * walked recursively and their entries sorted by path; explicit files are
 * kept whatever their extension.
 */
export async function collectWorkloadFiles(paths: string[], cwd = process.cwd()): Promise<string[]> {
  const files: string[] = []

  for (const path of paths) {
    const absolute = resolve(cwd, path)
    const info = await stat(absolute)

    if (info.isDirectory()) {
      files.push(...(await walk(absolute)))
    } else {
      files.push(absolute)
    }
  }

  return Array.from(new Set(files))
}

async function walk(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const found: string[] = []

  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      found.push(...(await walk(path)))
    } else if (entry.isFile() && WORKLOAD_EXTENSIONS.includes(extname(entry.name).toLowerCase())) {
      found.push(path)
    }
  }

  return found.sort()
}

/**
 * Reads workload files. Unreadable paths become SpecParseErrors rather than
 * aborting the whole read.
 */
export async function readWorkloadFiles(paths: string[], cwd = process.cwd()): Promise<ReadResult> {
  const sources: TextSource[] = []
  const errors: SpecParseError[] = []

  for (const path of paths) {
    let files: string[]
    try {
      files = await collectWorkloadFiles([path], cwd)
    } catch (error) {
      errors.push(new SpecParseError(`cannot read workload path: ${toError(error).message}`, path))
      continue
    }

    for (const file of files) {
      try {
        sources.push({ origin: file, content: await readFile(file, 'utf-8') })
      } catch (error) {
        errors.push(new SpecParseError(`cannot read workload file: ${toError(error).message}`, file))
      }
    }
  }

  return { sources, errors }
}
