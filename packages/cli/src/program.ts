import { Command } from 'commander'
import { componentsCommand } from './commands/components.js'
import { runCommand } from './commands/run.js'

export function createProgram(): Command {
  return new Command()
    .name('graphweave')
    .description('Turn web pages, files and APIs into a typed knowledge graph')
    .version('0.1.0')
    .addCommand(runCommand())
    .addCommand(componentsCommand())
}
