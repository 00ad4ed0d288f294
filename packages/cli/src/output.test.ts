import { afterEach, describe, it, expect, vi } from 'vitest'
import { SchemaError } from '@graphweave/core'
import { handleError } from './output.js'

describe('handleError', () => {
  afterEach(() => {
    process.exitCode = undefined
    vi.restoreAllMocks()
  })

  it('should print code, message and suggestion of library errors', () => {
    const lines: string[] = []
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      lines.push(String(line))
    })

    handleError(new SchemaError('pipeline.yaml: config.concurrency: Expected number', {
      suggestion: 'Top-level keys are strategies, options and config',
    }))

    expect(process.exitCode).toBe(1)
    expect(lines).toHaveLength(3)
    expect(lines[1]).toContain('pipeline.yaml: config.concurrency: Expected number')
    expect(lines[2]).toContain('Suggestion: Top-level keys are strategies, options and config')
  })

  it('should print plain errors with their message only', () => {
    const lines: string[] = []
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      lines.push(String(line))
    })

    handleError(new Error('boom'))

    expect(process.exitCode).toBe(1)
    expect(lines).toHaveLength(1)
    expect(lines[0]).toContain('Error: boom')
  })
})
