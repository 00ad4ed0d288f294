import { z } from 'zod'
import type { Role } from './roles.js'

const strategyName = z.string().min(1).optional()

const RoleDefaultsSchema = z
  .object({
    seeder: strategyName,
    fetcher: strategyName,
    generator: strategyName,
    parser: strategyName,
    refiner: strategyName,
    splitter: strategyName,
    mapper: strategyName,
    builder: strategyName,
    writer: strategyName,
  })
  .strict()

export const DEFAULT_STRATEGIES: Readonly<Partial<Record<Role, string>>> = {
  seeder: 'uri',
  fetcher: 'file',
  parser: 'auto',
  refiner: 'text_cleaner',
  splitter: 'markdown',
  mapper: 'document_chunk',
  builder: 'graph',
  writer: 'json_file',
}

export const PipelineConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Worker pool size for the fetch/generate loop */
  concurrency: z.number().int().positive().default(4),
  /** Upper bound on identifiers dispatched to fetchers in one run */
  maxItems: z.number().int().positive().default(1000),
  /** Link-following depth; seeds are depth 0 */
  maxDepth: z.number().int().nonnegative().default(3),
  /** Minimum spacing between fetch dispatches in ms (0 disables) */
  rateLimitMs: z.number().int().nonnegative().default(0),
  /** Per-call timeout advisory handed to every I/O attempt */
  timeoutMs: z.number().int().positive().default(30000),
  /** Consecutive hook failures before a component is marked failed */
  failureThreshold: z.number().int().positive().default(3),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      delayMs: z.number().int().nonnegative().default(1000),
      backoffMultiplier: z.number().min(1).default(1),
    })
    .default({}),
  defaults: RoleDefaultsSchema.default({}),
})

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>

/**
 * Build the pipeline configuration. Precedence: explicit overrides, then
 * GRAPHWEAVE_* environment variables, then schema defaults.
 */
export function loadConfig(
  overrides: PipelineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const configInput = {
    logLevel: overrides.logLevel ?? env.GRAPHWEAVE_LOG_LEVEL,
    concurrency: overrides.concurrency ?? numberFrom(env.GRAPHWEAVE_CONCURRENCY),
    maxItems: overrides.maxItems ?? numberFrom(env.GRAPHWEAVE_MAX_ITEMS),
    maxDepth: overrides.maxDepth ?? numberFrom(env.GRAPHWEAVE_MAX_DEPTH),
    rateLimitMs: overrides.rateLimitMs ?? numberFrom(env.GRAPHWEAVE_RATE_LIMIT_MS),
    timeoutMs: overrides.timeoutMs ?? numberFrom(env.GRAPHWEAVE_TIMEOUT_MS),
    failureThreshold:
      overrides.failureThreshold ?? numberFrom(env.GRAPHWEAVE_FAILURE_THRESHOLD),
    retry: {
      maxAttempts:
        overrides.retry?.maxAttempts ?? numberFrom(env.GRAPHWEAVE_RETRY_MAX_ATTEMPTS),
      delayMs: overrides.retry?.delayMs ?? numberFrom(env.GRAPHWEAVE_RETRY_DELAY_MS),
      backoffMultiplier:
        overrides.retry?.backoffMultiplier ?? numberFrom(env.GRAPHWEAVE_RETRY_BACKOFF),
    },
    defaults: overrides.defaults,
  }

  return PipelineConfigSchema.parse(configInput)
}

/**
 * Strategy used for a role when the run's strategy map does not name one.
 */
export function defaultStrategyFor(config: PipelineConfig, role: Role): string | undefined {
  return config.defaults[role] ?? DEFAULT_STRATEGIES[role]
}

function numberFrom(value?: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}
