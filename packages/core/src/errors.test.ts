import { describe, expect, it } from 'vitest'
import {
  ComponentError,
  CoreError,
  ErrorCodes,
  FetcherError,
  ROLE_ERRORS,
  UnknownRoleError,
  UnresolvedComponentError,
  WriterError,
  errorMessage,
  isCoreError,
  isRetryable,
} from './errors.js'

describe('CoreError', () => {
  it('stores code, suggestion and cause', () => {
    const cause = new Error('disk full')
    const error = new CoreError(ErrorCodes.COMPONENT_FAILED, 'Write failed', {
      cause,
      suggestion: 'Free some space',
    })

    expect(error.code).toBe('COMPONENT_FAILED')
    expect(error.suggestion).toBe('Free some space')
    expect(error.cause).toBe(cause)
    expect(error.retryable).toBe(false)
    expect(error.name).toBe('CoreError')
    expect(isCoreError(error)).toBe(true)
  })
})

describe('registry errors', () => {
  it('lists the declared roles for an unknown role', () => {
    const error = new UnknownRoleError('transformer', ['seeder', 'fetcher'])
    expect(error.message).toBe("Unknown component role: 'transformer'")
    expect(error.suggestion).toBe('Declared roles: seeder, fetcher')
  })

  it('lists registered names for an unresolved component', () => {
    const error = new UnresolvedComponentError('writer', 's3', ['console', 'jsonl'])
    expect(error.message).toBe("No writer registered under 's3'")
    expect(error.suggestion).toBe('Registered writer components: console, jsonl')
  })
})

describe('ComponentError', () => {
  it('is retryable by default and prefixes the component', () => {
    const error = new FetcherError('fetcher', 'HttpFetcher', 'socket hang up')
    expect(error.message).toBe('[HttpFetcher] socket hang up')
    expect(error.retryable).toBe(true)
    expect(error.name).toBe('FetcherError')
    expect(error).toBeInstanceOf(ComponentError)
  })

  it('maps every role to its error class', () => {
    expect(ROLE_ERRORS.writer).toBe(WriterError)
    expect(Object.keys(ROLE_ERRORS)).toHaveLength(9)
  })
})

describe('isRetryable', () => {
  it('treats plain errors as transient', () => {
    expect(isRetryable(new Error('ECONNRESET'))).toBe(true)
  })

  it('respects the retryable flag', () => {
    const error = new ComponentError('parser', 'HtmlParser', 'bad', { retryable: false })
    expect(isRetryable(error)).toBe(false)
  })
})

describe('errorMessage', () => {
  it('stringifies non-errors', () => {
    expect(errorMessage('plain')).toBe('plain')
    expect(errorMessage(new Error('boom'))).toBe('boom')
  })
})
