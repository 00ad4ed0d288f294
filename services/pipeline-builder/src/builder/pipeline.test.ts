import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { Logger, NodeClass, loadConfig } from '@graphweave/core'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { createDefaultRegistry, documentNodeId } from './adapters/index.js'
import { PipelineProcessor } from './processor/index.js'

const quiet = new Logger('error', () => {})

const GraphFileSchema = z.object({
  entities: z.record(z.object({ nodeClass: z.string() }).passthrough()),
})

async function documentIds(graphFile: string): Promise<string[]> {
  const { entities } = GraphFileSchema.parse(JSON.parse(await fs.readFile(graphFile, 'utf-8')))
  return Object.entries(entities)
    .filter(([, node]) => node.nodeClass === NodeClass.DOCUMENT)
    .map(([id]) => id)
    .sort()
}

function createQuietProcessor(): PipelineProcessor {
  return new PipelineProcessor(createDefaultRegistry(), {
    config: loadConfig({ retry: { delayMs: 0 } }, {}),
    logger: quiet,
  })
}

describe('built-in pipeline', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'))
    await fs.mkdir(path.join(dir, 'docs'))
    await fs.writeFile(path.join(dir, 'docs', 'guide.md'), '# Guide\n\nHello world\n')
    await fs.writeFile(path.join(dir, 'docs', 'data.json'), '{"a":1}')
    await fs.writeFile(path.join(dir, 'docs', 'logo.png'), 'PNG')
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('turns a directory of documents into a graph file', async () => {
    const destination = path.join(dir, 'out', 'graph.json')
    const processor = new PipelineProcessor(createDefaultRegistry(), {
      config: loadConfig({ retry: { delayMs: 0 } }, {}),
      logger: quiet,
    })

    const stats = await processor.process({
      source: path.join(dir, 'docs'),
      destination,
      strategies: { seeder: 'directory' },
      options: { extensions: ['.md', '.json'] },
    })

    expect(stats).toEqual({
      seeded: 2,
      fetched: 2,
      generated: 0,
      written: 5,
      failed: 0,
      skipped: 0,
    })

    const written: unknown = JSON.parse(await fs.readFile(destination, 'utf-8'))
    expect(written).toMatchObject({
      kind: 'knowledge_graph',
      entities: {
        [documentNodeId(path.join(dir, 'docs', 'guide.md'))]: { friendlyName: 'Guide' },
        [documentNodeId(path.join(dir, 'docs', 'data.json'))]: { friendlyName: 'data.json' },
      },
    })
  })

  it('fetches pages linked back to their seed once', async () => {
    const site = path.join(dir, 'site')
    await fs.mkdir(site)
    const pageA = path.join(site, 'a.html')
    const pageB = path.join(site, 'b.html')
    await fs.writeFile(pageA, '<html><body><h1>Page A</h1><p>See <a href="b.html">B</a></p></body></html>')
    await fs.writeFile(pageB, '<html><body><h1>Page B</h1><p>Back to <a href="./a.html">A</a></p></body></html>')
    const destination = path.join(dir, 'out', 'site.json')

    const stats = await createQuietProcessor().process({
      source: site,
      destination,
      strategies: { seeder: 'directory', generator: 'html_link' },
      options: { extensions: ['.html'] },
    })

    expect(stats).toMatchObject({ seeded: 2, fetched: 2, generated: 0, failed: 0, skipped: 0 })
    expect(await documentIds(destination)).toEqual(
      [documentNodeId(pageA), documentNodeId(pageB)].sort()
    )
  })

  describe('over http', () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
    const pages: Record<string, string> = {
      'https://example.com/docs/': '<html><body><h1>Docs</h1><p><a href="a">Page A</a></p></body></html>',
      'https://example.com/docs/a': '<html><body><h1>A</h1><p><a href="/docs/">Docs home</a></p></body></html>',
    }

    beforeEach(() => {
      fetchMock.mockReset()
      fetchMock.mockImplementation(async (input) => {
        const body = pages[String(input)]
        return body === undefined
          ? new Response('missing', { status: 404 })
          : new Response(body, { status: 200, headers: { 'content-type': 'text/html' } })
      })
      vi.stubGlobal('fetch', fetchMock)
    })

    afterEach(() => {
      vi.unstubAllGlobals()
    })

    it('treats a seed with a trailing slash and its normalized link as one page', async () => {
      const stats = await createQuietProcessor().process({
        source: 'https://example.com/docs/',
        destination: path.join(dir, 'out', 'docs.json'),
        strategies: { fetcher: 'http', generator: 'html_link' },
      })

      expect(stats).toMatchObject({ seeded: 1, fetched: 2, generated: 1, failed: 0, skipped: 0 })
      expect(fetchMock.mock.calls.map(([input]) => String(input))).toEqual([
        'https://example.com/docs/',
        'https://example.com/docs/a',
      ])
    })
  })
})
