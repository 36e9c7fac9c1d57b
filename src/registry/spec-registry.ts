import { parse as parseYaml } from 'yaml'
import { WorkloadSourceSchema, specKey, type WorkloadSpec } from '../core/types'
import { SpecParseError, formatSchemaIssue, toError, type SpecRef } from '../core/errors'
import { readWorkloadFiles, type WorkloadSourceInput } from './workload-files'
import { logger } from '../logger'

export interface LoadResult {
  loaded: WorkloadSpec[]
  errors: SpecParseError[]
}

/**
 * SpecRegistry - validated, immutable workload definitions keyed by
 * `(name, language)`.
 */
export class SpecRegistry {
  private specs = new Map<string, WorkloadSpec>()

  get size(): number {
    return this.specs.size
  }

  /**
   * Registers every source or none of them
   */
  load(sources: WorkloadSourceInput[]): WorkloadSpec[] {
    const parsed = sources.map((source) => parseWorkload(source))
    const batch = new Set<string>()

    for (const spec of parsed) {
      const key = specKey(spec)
      if (this.specs.has(key) || batch.has(key)) {
        throw duplicateError(spec)
      }
      batch.add(key)
    }

    parsed.forEach((spec) => this.specs.set(specKey(spec), spec))
    return parsed
  }

  /**
   * Registers each valid source independently and reports the rest
   */
  loadEach(sources: WorkloadSourceInput[]): LoadResult {
    const result: LoadResult = { loaded: [], errors: [] }

    for (const source of sources) {
      try {
        const spec = parseWorkload(source)
        if (this.specs.has(specKey(spec))) {
          throw duplicateError(spec)
        }
        this.specs.set(specKey(spec), spec)
        result.loaded.push(spec)
      } catch (error) {
        const parseError =
          error instanceof SpecParseError ? error : new SpecParseError(toError(error).message, source.origin)
        logger.warn(parseError.message)
        result.errors.push(parseError)
      }
    }

    return result
  }

  async loadFiles(paths: string[], cwd?: string): Promise<WorkloadSpec[]> {
    const { sources, errors } = await readWorkloadFiles(paths, cwd)
    const [firstError] = errors
    if (firstError) {
      throw firstError
    }
    return this.load(sources)
  }

  async loadFilesEach(paths: string[], cwd?: string): Promise<LoadResult> {
    const { sources, errors } = await readWorkloadFiles(paths, cwd)
    errors.forEach((error) => logger.warn(error.message))

    const result = this.loadEach(sources)
    return { loaded: result.loaded, errors: [...errors, ...result.errors] }
  }

  get(name: string, language: string): WorkloadSpec | undefined {
    return this.specs.get(specKey({ name, language }))
  }

  has(name: string, language: string): boolean {
    return this.specs.has(specKey({ name, language }))
  }

  list(): WorkloadSpec[] {
    return Array.from(this.specs.values())
  }
}

/**
 * Parses and validates a single workload definition into a frozen spec
 */
export function parseWorkload(source: WorkloadSourceInput): WorkloadSpec {
  let data: unknown
  if ('content' in source) {
    try {
      data = parseYaml(source.content)
    } catch (error) {
      throw new SpecParseError(`malformed workload file: ${toError(error).message}`, source.origin)
    }
  } else {
    data = source.data
  }

  const result = WorkloadSourceSchema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues.map(formatSchemaIssue)
    throw new SpecParseError(issues.join('; '), source.origin, partialRef(data), issues)
  }

  const raw = result.data
  return Object.freeze({
    name: raw.name,
    language: raw.language,
    code: raw.code,
    description: raw.description,
    dependencies: Object.freeze([...raw.dependencies]),
    options: Object.freeze([...raw.options]),
    args: Object.freeze([...raw.args]),
    stdin: raw.stdin,
    expectedStdout: raw.expected_stdout,
    measurement: raw.measurement ? Object.freeze({ ...raw.measurement }) : undefined,
    niceness: raw.niceness,
    origin: source.origin,
  })
}

function partialRef(data: unknown): SpecRef | undefined {
  if (typeof data !== 'object' || data === null) {
    return undefined
  }
  const name: unknown = Reflect.get(data, 'name')
  const language: unknown = Reflect.get(data, 'language')
  return typeof name === 'string' && typeof language === 'string' ? { name, language } : undefined
}

function duplicateError(spec: WorkloadSpec): SpecParseError {
  return new SpecParseError(
    `duplicate workload "${spec.name}" for language "${spec.language}"`,
    spec.origin,
    { name: spec.name, language: spec.language },
  )
}
