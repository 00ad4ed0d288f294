import {
  ATOM_TYPES,
  InitializationError,
  Logger,
  readPayload,
  toBlockAtom,
  type Atom,
} from '@graphweave/core'
import { describe, expect, it } from 'vitest'
import { ChunkPayloadSchema } from '../payloads.js'
import { shortHash } from '../urls.js'
import { FixedLengthSplitter, MarkdownSplitter } from './splitters.js'

const quiet = new Logger('error', () => {})

function chunkOf(atom: Atom | undefined) {
  if (!atom) throw new Error('missing chunk atom')
  return readPayload(atom, ATOM_TYPES.CHUNK, ChunkPayloadSchema)
}

describe('FixedLengthSplitter', () => {
  it('cuts overlapping windows with per-source part indexes', async () => {
    const splitter = new FixedLengthSplitter({ logger: quiet })
    await splitter.initialize({ chunkSize: 4, chunkOverlap: 1 })

    const chunks = await splitter.transform([
      toBlockAtom('a.txt', { type: 'text', content: 'abcdefghij', metadata: { title: 'A' } }),
    ])

    expect(chunks.map((atom) => chunkOf(atom).content)).toEqual(['abcd', 'defg', 'ghij', 'j'])
    expect(chunkOf(chunks[3]).metadata).toEqual({
      chunkId: `${shortHash('a.txt')}:3`,
      source: 'a.txt',
      title: 'A',
      partIndex: 3,
      semanticType: 'text',
      heading: '',
      headingPath: [],
      tokenCount: 1,
    })
  })

  it('continues part indexes across blocks of the same source', async () => {
    const splitter = new FixedLengthSplitter({ logger: quiet })
    await splitter.initialize({ chunkSize: 10 })

    const chunks = await splitter.transform([
      toBlockAtom('a.txt', { type: 'text', content: 'first', metadata: {} }),
      toBlockAtom('b.txt', { type: 'text', content: 'other', metadata: {} }),
      toBlockAtom('a.txt', { type: 'text', content: 'second', metadata: {} }),
    ])

    expect(chunks.map((atom) => chunkOf(atom).metadata.partIndex)).toEqual([0, 0, 1])
  })

  it('turns record blocks into one JSON chunk', async () => {
    const splitter = new FixedLengthSplitter({ logger: quiet })
    await splitter.initialize({ chunkSize: 2 })

    const [chunk] = await splitter.transform([
      toBlockAtom('items.json', { type: 'record', content: { k: 1 }, metadata: {} }),
    ])

    expect(chunkOf(chunk).content).toBe('{"k":1}')
    expect(chunkOf(chunk).metadata.semanticType).toBe('record')
  })

  it('requires overlap below the window size', async () => {
    const splitter = new FixedLengthSplitter({ logger: quiet })

    const error = await splitter
      .initialize({ chunkSize: 4, chunkOverlap: 4 })
      .catch((e: unknown) => e)
    expect(error).toBeInstanceOf(InitializationError)
    expect(error).toMatchObject({
      message:
        '[FixedLengthSplitter] Invalid options - chunkOverlap: chunkOverlap must be smaller than chunkSize',
    })
  })
})

describe('MarkdownSplitter', () => {
  it('records heading paths on chunks', async () => {
    const splitter = new MarkdownSplitter({ logger: quiet })
    await splitter.initialize()

    const [chunk] = await splitter.transform([
      toBlockAtom('guide.md', {
        type: 'md',
        content: '# Guide\n\nHello world',
        metadata: { title: 'Guide' },
      }),
    ])

    expect(chunkOf(chunk)).toEqual({
      content: '# Guide\n\nHello world',
      metadata: {
        chunkId: `${shortHash('guide.md')}:0`,
        source: 'guide.md',
        title: 'Guide',
        partIndex: 0,
        semanticType: 'text',
        heading: 'Guide',
        headingPath: ['Guide'],
        tokenCount: 5,
      },
    })
  })
})
