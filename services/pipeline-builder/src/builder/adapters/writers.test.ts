import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { KnowledgeGraph, Logger } from '@graphweave/core'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConsoleWriter, JsonFileWriter, JsonlWriter } from './writers.js'

const quiet = new Logger('error', () => {})

function sampleGraph(): KnowledgeGraph {
  const graph = new KnowledgeGraph()
  graph.addNode({ nodeId: 'doc:1', nodeClass: 'gw:Document', attributes: {}, relationships: {} })
  graph.addNode({
    nodeId: 'chunk:1',
    nodeClass: 'gw:TextFragment',
    attributes: { 'schema:text': 'hi' },
    relationships: { 'gw:belongsTo': ['doc:1'] },
  })
  graph.seal()
  return graph
}

describe('file writers', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'writers-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('json_file writes the whole graph keyed by node id', async () => {
    const target = path.join(dir, 'out', 'graph.json')
    const writer = new JsonFileWriter({ logger: quiet })
    await writer.initialize({ pretty: false })

    const result = await writer.store(sampleGraph(), target)

    expect(result).toEqual({ written: 2, failed: 0, failedUnits: [] })
    expect(await fs.readFile(target, 'utf-8')).toBe(
      '{"kind":"knowledge_graph","entities":{' +
        '"doc:1":{"nodeId":"doc:1","nodeClass":"gw:Document","attributes":{},"relationships":{}},' +
        '"chunk:1":{"nodeId":"chunk:1","nodeClass":"gw:TextFragment","attributes":{"schema:text":"hi"},"relationships":{"gw:belongsTo":["doc:1"]}}' +
        '}}\n'
    )
  })

  it('jsonl writes one node per line', async () => {
    const target = path.join(dir, 'graph.jsonl')
    const writer = new JsonlWriter({ logger: quiet })
    await writer.initialize()

    await writer.store(sampleGraph(), target)

    const lines = (await fs.readFile(target, 'utf-8')).split('\n')
    expect(lines).toEqual([
      '{"nodeId":"doc:1","nodeClass":"gw:Document","attributes":{},"relationships":{}}',
      '{"nodeId":"chunk:1","nodeClass":"gw:TextFragment","attributes":{"schema:text":"hi"},"relationships":{"gw:belongsTo":["doc:1"]}}',
      '',
    ])
    await writer.dispose()
  })
})

describe('ConsoleWriter', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints every unit', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const writer = new ConsoleWriter({ logger: quiet })
    await writer.initialize()

    const result = await writer.store(sampleGraph(), 'stdout')

    expect(result.written).toBe(2)
    expect(log).toHaveBeenNthCalledWith(
      1,
      '{"nodeId":"doc:1","nodeClass":"gw:Document","attributes":{},"relationships":{}}'
    )
  })
})
