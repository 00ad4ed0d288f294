import {
  ATOM_TYPES,
  Splitter,
  createAtom,
  readBlock,
  type Atom,
  type ContentBlock,
} from '@graphweave/core'
import { z } from 'zod'
import { DocumentChunker, DEFAULT_CHUNKER_OPTIONS, estimateTokens, type ChunkData } from '../chunker.js'
import type { ChunkPayloadInput } from '../payloads.js'
import { shortHash } from '../urls.js'

/**
 * Shared block → chunk plumbing: record blocks become one JSON chunk,
 * string blocks go through `split`.
 */
abstract class BlockSplitter<TOptions> extends Splitter<TOptions> {
  protected async doTransform(atoms: readonly Atom[]): Promise<Atom[]> {
    const output: Atom[] = []
    // part indexes continue across blocks of the same source
    const nextPart = new Map<string, number>()

    for (const atom of atoms) {
      const block = readBlock(atom)
      const title = typeof block.metadata.title === 'string' ? block.metadata.title : ''
      const pieces =
        typeof block.content === 'string'
          ? this.split(block.content)
          : [recordPiece(block)]

      for (const piece of pieces) {
        const partIndex = nextPart.get(atom.source) ?? 0
        nextPart.set(atom.source, partIndex + 1)

        const payload: ChunkPayloadInput = {
          content: piece.content,
          metadata: {
            chunkId: `${shortHash(atom.source)}:${partIndex}`,
            source: atom.source,
            title,
            partIndex,
            semanticType: piece.semanticType,
            heading: piece.heading,
            headingPath: piece.headingHierarchy.map((h) => h.text),
            tokenCount: piece.tokenCount,
          },
        }
        output.push(createAtom(atom.source, ATOM_TYPES.CHUNK, payload))
      }
    }
    return output
  }

  protected abstract split(text: string): ChunkData[]
}

function recordPiece(block: ContentBlock): ChunkData {
  const content = JSON.stringify(block.content)
  return {
    content,
    chunkIndex: 0,
    startChar: 0,
    endChar: content.length,
    heading: '',
    headingHierarchy: [],
    tokenCount: estimateTokens(content),
    semanticType: 'record',
  }
}

export const MarkdownSplitterOptionsSchema = z.object({
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNKER_OPTIONS.chunkSize),
  chunkOverlap: z.number().int().nonnegative().default(DEFAULT_CHUNKER_OPTIONS.chunkOverlap),
  minChunkSize: z.number().int().nonnegative().default(DEFAULT_CHUNKER_OPTIONS.minChunkSize),
  splitHeadingLevel: z.number().int().min(1).max(6).default(DEFAULT_CHUNKER_OPTIONS.splitHeadingLevel),
})

export type MarkdownSplitterOptions = z.infer<typeof MarkdownSplitterOptionsSchema>

/**
 * Heading-aware Markdown chunker (sizes in estimated tokens).
 */
export class MarkdownSplitter extends BlockSplitter<MarkdownSplitterOptions> {
  readonly name = 'MarkdownSplitter'
  protected readonly optionsSchema = MarkdownSplitterOptionsSchema
  private chunker = new DocumentChunker()

  protected async setup(options: MarkdownSplitterOptions): Promise<void> {
    this.chunker = new DocumentChunker(options)
  }

  protected split(text: string): ChunkData[] {
    return this.chunker.chunk(text)
  }
}

export const FixedLengthSplitterOptionsSchema = z
  .object({
    chunkSize: z.number().int().positive().default(1000),
    chunkOverlap: z.number().int().nonnegative().default(0),
  })
  .refine((options) => options.chunkOverlap < options.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  })

export type FixedLengthSplitterOptions = z.infer<typeof FixedLengthSplitterOptionsSchema>

/**
 * Fixed character windows; each window starts `chunkSize - chunkOverlap`
 * characters after the previous one.
 */
export class FixedLengthSplitter extends BlockSplitter<FixedLengthSplitterOptions> {
  readonly name = 'FixedLengthSplitter'
  protected readonly optionsSchema = FixedLengthSplitterOptionsSchema

  protected split(text: string): ChunkData[] {
    const { chunkSize, chunkOverlap } = this.options
    const step = chunkSize - chunkOverlap
    const chunks: ChunkData[] = []

    for (let start = 0; start < text.length; start += step) {
      const content = text.slice(start, start + chunkSize)
      chunks.push({
        content,
        chunkIndex: chunks.length,
        startChar: start,
        endChar: start + content.length,
        heading: '',
        headingHierarchy: [],
        tokenCount: estimateTokens(content),
        semanticType: 'text',
      })
    }
    return chunks
  }
}
