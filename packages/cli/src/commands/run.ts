import { Command } from 'commander'
import chalk from 'chalk'
import { z } from 'zod'
import { loadConfig, logger, type PipelineConfig } from '@graphweave/core'
import {
  createProcessor,
  formatRunReport,
  getDefaultRegistry,
  loadPipelineFile,
  type PipelineFile,
  type PipelineProgress,
  type PipelineRequest,
  type RunStats,
} from '@graphweave/pipeline-builder'
import { handleError } from '../output.js'
import {
  collect,
  parseAssignments,
  parseInteger,
  parseOptionAssignments,
} from '../utils/assignments.js'

const RunFlagsSchema = z.object({
  strategy: z.array(z.string()).default([]),
  option: z.array(z.string()).default([]),
  pipeline: z.string().optional(),
  concurrency: z.number().int().optional(),
  maxItems: z.number().int().optional(),
  maxDepth: z.number().int().optional(),
  json: z.boolean().default(false),
})

export type RunFlags = z.infer<typeof RunFlagsSchema>

export interface RunPlan {
  request: PipelineRequest
  config: PipelineConfig
}

/**
 * Merge a pipeline file with command line flags. Flags win over the file,
 * the file wins over GRAPHWEAVE_* variables.
 */
export function buildRunPlan(
  source: string,
  destination: string,
  flags: RunFlags,
  file?: PipelineFile,
  env: NodeJS.ProcessEnv = process.env
): RunPlan {
  const fileConfig: PipelineFile['config'] = file?.config ?? {}
  const config = loadConfig(
    {
      ...fileConfig,
      concurrency: flags.concurrency ?? fileConfig.concurrency,
      maxItems: flags.maxItems ?? fileConfig.maxItems,
      maxDepth: flags.maxDepth ?? fileConfig.maxDepth,
    },
    env
  )

  return {
    config,
    request: {
      source,
      destination,
      strategies: { ...file?.strategies, ...parseAssignments(flags.strategy) },
      options: { ...file?.options, ...parseOptionAssignments(flags.option) },
    },
  }
}

export function runCommand(): Command {
  return new Command('run')
    .description('Run a pipeline from a source to a destination')
    .argument('<source>', 'Source handed to the seeder (path, URL or manifest)')
    .argument('<destination>', 'Destination handed to the writer')
    .option('-s, --strategy <role=name>', 'Strategy for a role (repeatable)', collect, [])
    .option('-o, --option <key=value>', 'Run option for every component (repeatable)', collect, [])
    .option('-p, --pipeline <file>', 'YAML pipeline definition')
    .option('--concurrency <n>', 'Concurrent fetches', parseInteger)
    .option('--max-items <n>', 'Identifiers dispatched at most', parseInteger)
    .option('--max-depth <n>', 'Link-following depth', parseInteger)
    .option('-j, --json', 'Output raw JSON')
    .action(async (source: string, destination: string, options: unknown) => {
      try {
        const flags = RunFlagsSchema.parse(options)
        const file = flags.pipeline ? await loadPipelineFile(flags.pipeline) : undefined
        const { request, config } = buildRunPlan(source, destination, flags, file)
        logger.setLevel(config.logLevel)

        const controller = new AbortController()
        const abort = (): void => controller.abort()
        process.once('SIGINT', abort)
        process.once('SIGTERM', abort)

        let stats: RunStats
        try {
          const processor = createProcessor(getDefaultRegistry(), { config, logger })
          stats = await processor.process(
            { ...request, signal: controller.signal },
            reportProgress()
          )
        } finally {
          process.off('SIGINT', abort)
          process.off('SIGTERM', abort)
        }

        if (controller.signal.aborted) {
          console.error(chalk.yellow('Run cancelled, counters are partial'))
        }

        if (flags.json) {
          console.log(formatRunReport(stats, 2))
          return
        }
        printSummary(stats, destination)
      } catch (error) {
        handleError(error)
      }
    })
}

function reportProgress(): (progress: PipelineProgress) => void {
  let lastPhase = ''
  return (progress) => {
    if (progress.phase !== lastPhase) {
      lastPhase = progress.phase
      console.error(chalk.dim(`> ${progress.phase}`))
    }
    if (progress.currentIdentifier) {
      console.error(chalk.dim(`  ${progress.currentIdentifier}`))
    }
  }
}

function printSummary(stats: RunStats, destination: string): void {
  console.log(chalk.bold(`\nPipeline finished -> ${destination}\n`))
  console.log(`  ${chalk.cyan('seeded')}     ${stats.seeded}`)
  console.log(`  ${chalk.cyan('fetched')}    ${stats.fetched}`)
  console.log(`  ${chalk.cyan('generated')}  ${stats.generated}`)
  console.log(`  ${chalk.green('written')}    ${stats.written}`)
  console.log(`  ${stats.failed > 0 ? chalk.red('failed') : chalk.dim('failed')}     ${stats.failed}`)
  console.log(`  ${chalk.dim('skipped')}    ${stats.skipped}`)
}
