import type { ZodIssue } from 'zod'
import { formatSchemaIssue } from '../errors'

/**
 * The merged configuration does not satisfy HarnessConfigSchema
 */
export class ConfigValidationError extends Error {
  readonly issues: string[]

  constructor(public readonly schemaIssues: ZodIssue[]) {
    super(`Invalid configuration (${schemaIssues.length} issue${schemaIssues.length === 1 ? '' : 's'})`)
    this.name = 'ConfigValidationError'
    this.issues = schemaIssues.map(formatSchemaIssue)
  }

  /**
   * One line per issue, prefixed with the config key it concerns
   */
  getErrorSummary(): string {
    return this.issues.join('\n')
  }
}

/**
 * A config source could not be read. `configPath` is set when a file was involved.
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ConfigLoadError'
  }
}
