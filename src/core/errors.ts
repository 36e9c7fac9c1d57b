import type { ZodIssue } from 'zod'

/**
 * Identifies the workload an error originated from
 */
export interface SpecRef {
  name: string
  language: string
}

export type HarnessErrorKind =
  | 'SpecParseError'
  | 'MissingDependency'
  | 'BuildFailure'
  | 'Timeout'
  | 'OutputMismatch'
  | 'NonZeroExit'
  | 'MeasurementUnavailable'

export function formatSpecRef(spec: SpecRef | undefined): string {
  return spec ? `${spec.name} (${spec.language})` : '<unknown workload>'
}

/**
 * Base class for every failure the harness classifies.
 * `spec` is absent only when a source could not be parsed far enough to know it.
 */
export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind

  constructor(
    message: string,
    public readonly spec?: SpecRef,
  ) {
    super(spec ? `[${formatSpecRef(spec)}] ${message}` : message)
    this.name = new.target.name
  }
}

export class SpecParseError extends HarnessError {
  readonly kind = 'SpecParseError' as const

  constructor(
    message: string,
    public readonly origin: string,
    spec?: SpecRef,
    public readonly issues: string[] = [],
  ) {
    super(`${origin}: ${message}`, spec)
  }
}

export class MissingDependency extends HarnessError {
  readonly kind = 'MissingDependency' as const

  constructor(
    spec: SpecRef,
    public readonly missing: string[],
  ) {
    super(`missing toolchain component(s): ${missing.join(', ')}`, spec)
  }
}

export class BuildFailure extends HarnessError {
  readonly kind = 'BuildFailure' as const

  constructor(
    spec: SpecRef,
    public readonly stderr: string,
    public readonly exitCode: number | null,
  ) {
    super(`build failed${exitCode === null ? '' : ` with exit code ${exitCode}`}: ${firstLine(stderr)}`, spec)
  }

  /**
   * Specs with identical sources share one cached build; each reports the failure under its own name
   */
  forSpec(spec: SpecRef): BuildFailure {
    return new BuildFailure({ name: spec.name, language: spec.language }, this.stderr, this.exitCode)
  }
}

export class TrialTimeout extends HarnessError {
  readonly kind = 'Timeout' as const

  constructor(
    spec: SpecRef,
    public readonly timeoutMs: number,
  ) {
    super(`execution exceeded ${timeoutMs}ms and was terminated`, spec)
  }
}

export class OutputMismatch extends HarnessError {
  readonly kind = 'OutputMismatch' as const

  constructor(
    spec: SpecRef,
    public readonly line: number,
    public readonly expected: string | undefined,
    public readonly actual: string | undefined,
  ) {
    super(`stdout differs from expected at line ${line}`, spec)
  }
}

export class NonZeroExit extends HarnessError {
  readonly kind = 'NonZeroExit' as const

  constructor(
    spec: SpecRef,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`process exited with code ${exitCode ?? 'null'}`, spec)
  }
}

/**
 * Fatal for the whole run: the sampler is a process-wide resource
 */
export class MeasurementUnavailable extends HarnessError {
  readonly kind = 'MeasurementUnavailable' as const

  constructor(spec: SpecRef | undefined, reason: string) {
    super(`energy sampler unavailable: ${reason}`, spec)
  }
}

/**
 * `path: message`, unless the message already starts with the key it concerns
 */
export function formatSchemaIssue(issue: ZodIssue): string {
  const path = issue.path.join('.')
  const key = issue.path[issue.path.length - 1]
  if (!path || (key !== undefined && issue.message.startsWith(`${String(key)} `))) {
    return issue.message
  }
  return `${path}: ${issue.message}`
}

export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

function firstLine(text: string): string {
  const line = text.split('\n').find((candidate) => candidate.trim().length > 0)
  return line?.trim() ?? 'no compiler output'
}
