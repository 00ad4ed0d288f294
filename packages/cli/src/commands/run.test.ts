import { describe, it, expect } from 'vitest'
import { buildRunPlan, type RunFlags } from './run.js'

const noFlags: RunFlags = { strategy: [], option: [], json: false }

describe('buildRunPlan', () => {
  it('should use defaults when neither file nor flags say otherwise', () => {
    const plan = buildRunPlan('./docs', './out/graph.json', noFlags, undefined, {})

    expect(plan.request).toEqual({
      source: './docs',
      destination: './out/graph.json',
      strategies: {},
      options: {},
    })
    expect(plan.config.concurrency).toBe(4)
    expect(plan.config.maxDepth).toBe(3)
  })

  it('should let flags override the pipeline file', () => {
    const plan = buildRunPlan(
      'https://example.com/',
      './out/graph.jsonl',
      {
        ...noFlags,
        strategy: ['writer=jsonl'],
        option: ['chunkSize=300'],
        concurrency: 2,
      },
      {
        strategies: { fetcher: 'http', writer: 'json_file' },
        options: { chunkSize: 800, includePatterns: ['^/docs'] },
        config: { concurrency: 8, maxDepth: 1 },
      },
      {}
    )

    expect(plan.request.strategies).toEqual({ fetcher: 'http', writer: 'jsonl' })
    expect(plan.request.options).toEqual({ chunkSize: 300, includePatterns: ['^/docs'] })
    expect(plan.config.concurrency).toBe(2)
    expect(plan.config.maxDepth).toBe(1)
  })

  it('should let the pipeline file override the environment', () => {
    const plan = buildRunPlan(
      './docs',
      './out',
      noFlags,
      { strategies: {}, options: {}, config: { maxItems: 10 } },
      { GRAPHWEAVE_MAX_ITEMS: '50', GRAPHWEAVE_RATE_LIMIT_MS: '250' }
    )

    expect(plan.config.maxItems).toBe(10)
    expect(plan.config.rateLimitMs).toBe(250)
  })
})
