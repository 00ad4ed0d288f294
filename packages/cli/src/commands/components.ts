import { Command } from 'commander'
import chalk from 'chalk'
import { ROLES } from '@graphweave/core'
import { getDefaultRegistry } from '@graphweave/pipeline-builder'
import { handleError, outputResult } from '../output.js'

export function componentsCommand(): Command {
  return new Command('components')
    .alias('ls')
    .description('List registered components per role')
    .option('-j, --json', 'Output raw JSON')
    .action((options: { json?: boolean }) => {
      try {
        const registered = getDefaultRegistry().describe()

        if (options.json) {
          outputResult(registered)
          return
        }

        for (const role of ROLES) {
          const names = registered[role]
          console.log(
            chalk.bold.white(role.padEnd(10)) +
              (names.length > 0 ? chalk.cyan(names.join(', ')) : chalk.dim('(none)'))
          )
        }
      } catch (error) {
        handleError(error)
      }
    })
}
