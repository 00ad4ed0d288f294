import fs from 'fs/promises'
import {
  Fetcher,
  FetcherError,
  advisoryTimeoutSignal,
  type FetchedResource,
} from '@graphweave/core'
import { z } from 'zod'
import { contentTypeFromExtension, toLocalPath } from '../urls.js'

const NoOptionsSchema = z.object({})

/**
 * Reads a local file (plain path or file:// URL) as UTF-8.
 * Empty files yield nothing.
 */
export class FileFetcher extends Fetcher<z.infer<typeof NoOptionsSchema>> {
  readonly name = 'FileFetcher'
  protected readonly optionsSchema = NoOptionsSchema

  protected async doFetch(identifier: string): Promise<FetchedResource | null> {
    const filePath = toLocalPath(identifier)

    let content: string
    try {
      content = await fs.readFile(filePath, { encoding: 'utf-8', signal: advisoryTimeoutSignal() })
    } catch (error) {
      if (isMissingFile(error)) {
        throw new FetcherError(this.role, this.name, `File not found: ${filePath}`, {
          cause: error,
          retryable: false,
        })
      }
      throw error
    }

    if (content.trim() === '') return null

    return {
      identifier,
      content,
      contentType: contentTypeFromExtension(filePath),
      metadata: { path: filePath, bytes: Buffer.byteLength(content) },
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR')
  )
}

export const HttpFetcherOptionsSchema = z.object({
  headers: z.record(z.string()).default({}),
  userAgent: z.string().default('graphweave/0.1'),
})

export type HttpFetcherOptions = z.infer<typeof HttpFetcherOptionsSchema>

/**
 * HTTP GET via the global fetch. Client errors other than 408/429 are not
 * retried; 204 and empty bodies yield nothing.
 */
export class HttpFetcher extends Fetcher<HttpFetcherOptions> {
  readonly name = 'HttpFetcher'
  protected readonly optionsSchema = HttpFetcherOptionsSchema

  protected async doFetch(identifier: string): Promise<FetchedResource | null> {
    this.logger.debug(`[${this.name}] Loading: ${identifier}`)

    const response = await fetch(identifier, {
      headers: { 'user-agent': this.options.userAgent, ...this.options.headers },
      signal: advisoryTimeoutSignal(),
      redirect: 'follow',
    })

    if (!response.ok) {
      const retryable = response.status >= 500 || response.status === 408 || response.status === 429
      throw new FetcherError(this.role, this.name, `HTTP ${response.status} for ${identifier}`, {
        retryable,
      })
    }

    if (response.status === 204) return null
    const content = await response.text()
    if (content.trim() === '') return null

    const contentType = response.headers.get('content-type')?.split(';')[0]?.trim()
    return {
      identifier,
      content,
      contentType: contentType || contentTypeFromExtension(identifier),
      metadata: { status: response.status, finalUrl: response.url || identifier },
    }
  }
}
