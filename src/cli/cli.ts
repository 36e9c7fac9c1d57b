import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { printConfigCommand } from './print-config'
import { measureCommand } from './commands/measure'
import { listCommand } from './commands/list'
import { logger } from '../logger'

export function createCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .scriptName('joulebench')
    .usage('$0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to configuration file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Enable verbose logging',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Suppress non-essential output',
      global: true,
    })
    .middleware((args) => {
      if (args.verbose) {
        logger.setLevel('debug')
      } else if (args.quiet) {
        logger.setLevel('warn')
      }
    })
    .command(measureCommand)
    .command(listCommand)
    .command(printConfigCommand)
    .demandCommand(1, 'You need to specify a command')
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  const cli = createCli(argv)

  if (argv) {
    return cli.parse()
  }

  return cli.argv
}
