/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig, ConfigLoadError, ConfigValidationError } from '../../core/config'
import { EnvironmentRegistry } from '../../environments'
import { SpecRegistry } from '../../registry'
import type { WorkloadSpec } from '../../core/types'
import { logger } from '../../logger'
import type { BaseArgs, ListArgs } from '../types'

export const listCommand: CommandModule<BaseArgs, ListArgs> = {
  command: 'list [files..]',
  describe: 'Validate workload files and list the specs they define',
  builder: (yargs) => {
    return yargs
      .positional('files', {
        type: 'string',
        array: true,
        describe: 'Workload files or directories (default: workloads from the config file)',
      })
      .example('$0 list workloads/', 'List every workload under workloads/')
  },
  handler: async (argv) => {
    try {
      const valid = await listWorkloads(argv)
      if (!valid) {
        process.exitCode = 1
      }
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        logger.error('Configuration validation failed:')
        logger.error(error.getErrorSummary())
      } else {
        logger.error(error instanceof Error ? error.message : String(error))
      }
      process.exit(1)
    }
  },
}

async function listWorkloads(args: ListArgs): Promise<boolean> {
  const config = await loadConfig({
    configPath: args.config,
    cliArgs: args.files && args.files.length > 0 ? { workloads: args.files } : {},
  })

  if (config.workloads.length === 0) {
    throw new ConfigLoadError('No workload files given; pass files to list or set "workloads" in the config')
  }

  const registry = new SpecRegistry()
  const { loaded, errors } = await registry.loadFilesEach(config.workloads)
  const environments = new EnvironmentRegistry()

  if (args.quiet) {
    console.log(JSON.stringify(loaded.map((spec) => describeSpec(spec, environments)), null, 2))
  } else {
    for (const spec of loaded) {
      const { name, language, environment, origin } = describeSpec(spec, environments)
      const known = environment ? '' : ' (no environment)'
      console.log(`${name.padEnd(24)} ${language.padEnd(12)} ${origin}${known}`)
    }
    console.error(`${loaded.length} workload(s), ${errors.length} invalid`)
  }

  errors.forEach((error) => logger.error(error.message))

  return errors.length === 0
}

function describeSpec(spec: WorkloadSpec, environments: EnvironmentRegistry) {
  return {
    name: spec.name,
    language: spec.language,
    environment: environments.find(spec.language)?.id ?? null,
    origin: spec.origin,
    dependencies: [...spec.dependencies],
    measurement: spec.measurement?.mode ?? 'default',
  }
}
