/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

export interface PrintConfigArgs extends BaseArgs {
  format?: string
}

export interface MeasureArgs extends BaseArgs {
  files?: string[]
  trials?: number
  timeout?: number
  warmupDiscard?: number
  iterations?: number
  buildConcurrency?: number
  // Choices are enforced by yargs and the config schema
  sampler?: string
  outputDir?: string
  format?: string[]
  cooldown?: number
  niceness?: number
  shuffle?: boolean
  keepBuilds?: boolean
  includeTrials?: boolean
}

export interface ListArgs extends BaseArgs {
  files?: string[]
}
