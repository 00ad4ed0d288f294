import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { createAtom, type Atom } from './atom.js'
import { Seeder, Splitter, Writer } from './capabilities.js'
import { ErrorCodes, SplitterError } from './errors.js'
import { KnowledgeGraph, type BuiltObject } from './graph.js'
import { Logger } from './logger.js'

const quiet = new Logger('error', () => {})
const NoOptions = z.object({})

class ListSeeder extends Seeder<z.infer<typeof NoOptions>> {
  readonly name = 'ListSeeder'
  protected readonly optionsSchema = NoOptions

  protected async doSeed(source: string): Promise<string[]> {
    return source.split(',')
  }
}

class HalvingSplitter extends Splitter<z.infer<typeof NoOptions>> {
  readonly name = 'HalvingSplitter'
  protected readonly optionsSchema = NoOptions

  protected async doTransform(atoms: readonly Atom[]): Promise<Atom[]> {
    return atoms.flatMap((atom) => {
      const text = atom.payload.text
      if (typeof text !== 'string') throw new Error(`no text in ${atom.atomId}`)
      const middle = Math.ceil(text.length / 2)
      return [text.slice(0, middle), text.slice(middle)].map((part) =>
        createAtom(atom.source, 'chunk', { text: part })
      )
    })
  }
}

class MemoryWriter extends Writer<z.infer<typeof NoOptions>> {
  readonly name = 'MemoryWriter'
  protected readonly optionsSchema = NoOptions
  readonly stored: string[] = []
  readonly attempts = new Map<string, number>()
  events: string[] = []

  constructor(private readonly poison: Set<string>) {
    super({ logger: quiet })
  }

  protected async open(destination: string): Promise<void> {
    this.events.push(`open ${destination}`)
  }

  protected async writeUnit(_record: Record<string, unknown>, id: string): Promise<void> {
    this.attempts.set(id, (this.attempts.get(id) ?? 0) + 1)
    if (this.poison.has(id)) throw new Error(`cannot write ${id}`)
    this.stored.push(id)
  }

  protected async close(): Promise<void> {
    this.events.push('close')
  }
}

function graphOf(...ids: string[]): KnowledgeGraph {
  const graph = new KnowledgeGraph()
  for (const id of ids) {
    graph.addNode({ nodeId: id, nodeClass: 'gw:Chunk', attributes: {}, relationships: {} })
  }
  return graph
}

describe('Seeder', () => {
  it('returns the identifiers from the hook', async () => {
    const seeder = new ListSeeder({ logger: quiet })
    await seeder.initialize()

    await expect(seeder.seed('a,b,c')).resolves.toEqual(['a', 'b', 'c'])
  })

  it('rejects an empty source', async () => {
    const seeder = new ListSeeder({ logger: quiet })
    await seeder.initialize()

    await expect(seeder.seed('')).rejects.toMatchObject({
      code: ErrorCodes.INVALID_REQUEST,
    })
  })
})

describe('Splitter', () => {
  it('transforms the whole batch', async () => {
    const splitter = new HalvingSplitter({ logger: quiet })
    await splitter.initialize()
    const atoms = [createAtom('doc', 'content_block', { text: 'abcd' })]

    const chunks = await splitter.transform(atoms)

    expect(chunks.map((chunk) => chunk.payload.text)).toEqual(['ab', 'cd'])
    expect(chunks.every((chunk) => chunk.source === 'doc')).toBe(true)
  })

  it('raises a SplitterError when the hook fails', async () => {
    const splitter = new HalvingSplitter({ logger: quiet })
    await splitter.initialize()
    const untexted = createAtom('doc', 'content_block', {})

    await expect(splitter.transform([untexted])).rejects.toBeInstanceOf(SplitterError)
  })
})

describe('Writer', () => {
  it('writes every unit between open and close', async () => {
    const writer = new MemoryWriter(new Set())
    await writer.initialize()

    const result = await writer.store(graphOf('a', 'b'), 'mem://out')

    expect(result).toEqual({ written: 2, failed: 0, failedUnits: [] })
    expect(writer.events).toEqual(['open mem://out', 'close'])
  })

  it('counts failed units and keeps writing the rest', async () => {
    const writer = new MemoryWriter(new Set(['b']))
    await writer.initialize()

    const result = await writer.store(graphOf('a', 'b', 'c'), 'mem://out', {
      maxAttempts: 2,
      delayMs: 0,
    })

    expect(result).toEqual({ written: 2, failed: 1, failedUnits: ['b'] })
    expect(writer.stored).toEqual(['a', 'c'])
    expect(writer.attempts.get('b')).toBe(2)
    expect(writer.getState()).toBe('ready')
  })

  it('rejects a blank destination', async () => {
    const writer = new MemoryWriter(new Set())
    await writer.initialize()
    const built: BuiltObject = graphOf('a')

    await expect(writer.store(built, ' ')).rejects.toThrow(
      '[MemoryWriter] Invalid request: destination must be a non-empty string'
    )
  })
})
