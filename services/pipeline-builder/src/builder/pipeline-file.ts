import fs from 'fs/promises'
import YAML from 'yaml'
import { z } from 'zod'
import { SchemaError, errorMessage } from '@graphweave/core'

const ConfigOverridesSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    concurrency: z.number().optional(),
    maxItems: z.number().optional(),
    maxDepth: z.number().optional(),
    rateLimitMs: z.number().optional(),
    timeoutMs: z.number().optional(),
    failureThreshold: z.number().optional(),
    retry: z
      .object({
        maxAttempts: z.number().optional(),
        delayMs: z.number().optional(),
        backoffMultiplier: z.number().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

export const PipelineFileSchema = z
  .object({
    /** role → strategy name */
    strategies: z.record(z.string().min(1)).default({}),
    /** handed to every component's initialize() */
    options: z.record(z.unknown()).default({}),
    config: ConfigOverridesSchema.default({}),
  })
  .strict()

export type PipelineFile = z.infer<typeof PipelineFileSchema>

/**
 * Parse a YAML pipeline definition. An empty document is an empty pipeline.
 */
export function parsePipelineFile(content: string, origin = 'pipeline'): PipelineFile {
  let document: unknown
  try {
    document = YAML.parse(content)
  } catch (error) {
    throw new SchemaError(`${origin}: invalid YAML - ${errorMessage(error)}`, { cause: error })
  }

  const parsed = PipelineFileSchema.safeParse(document ?? {})
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    )
    throw new SchemaError(`${origin}: ${problems.join('; ')}`, {
      cause: parsed.error,
      suggestion: 'Top-level keys are strategies, options and config',
    })
  }
  return parsed.data
}

export async function loadPipelineFile(filePath: string): Promise<PipelineFile> {
  const content = await fs.readFile(filePath, 'utf-8')
  return parsePipelineFile(content, filePath)
}
