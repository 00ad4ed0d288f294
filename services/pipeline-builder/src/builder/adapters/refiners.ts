import {
  ATOM_TYPES,
  ContentBlockSchema,
  Refiner,
  SchemaError,
  readPayload,
  toBlockAtom,
  type Atom,
  type ContentBlock,
} from '@graphweave/core'
import { z } from 'zod'
import { DocumentPayloadSchema } from '../payloads.js'

export const TextCleanerOptionsSchema = z.object({
  /** Regular expressions whose matches are removed from text blocks */
  cleanPatterns: z
    .array(z.string())
    .default([])
    .superRefine((patterns, ctx) => {
      patterns.forEach((pattern, index) => {
        try {
          new RegExp(pattern)
        } catch {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index],
            message: `Invalid regular expression: ${pattern}`,
          })
        }
      })
    }),
  normalizeSpace: z.boolean().default(true),
})

export type TextCleanerOptions = z.infer<typeof TextCleanerOptionsSchema>

const SPACE_RUN = /[ \t]+/g

/**
 * Turns parsed documents into ContentBlocks, removing configured patterns and
 * collapsing runs of spaces in text and Markdown blocks. Blocks left empty are
 * dropped.
 */
export class TextCleaner extends Refiner<TextCleanerOptions> {
  readonly name = 'TextCleaner'
  protected readonly optionsSchema = TextCleanerOptionsSchema
  private patterns: RegExp[] = []

  protected async setup(options: TextCleanerOptions): Promise<void> {
    this.patterns = options.cleanPatterns.map((pattern) => new RegExp(pattern, 'g'))
  }

  protected async doTransform(atoms: readonly Atom[]): Promise<Atom[]> {
    const blocks: Atom[] = []
    for (const atom of atoms) {
      const block = this.clean(this.toBlock(atom))
      if (typeof block.content === 'string' && block.content === '') {
        this.logger.debug(`[${this.name}] Dropped empty block from ${atom.source}`)
        continue
      }
      blocks.push(toBlockAtom(atom.source, block))
    }
    return blocks
  }

  private toBlock(atom: Atom): ContentBlock {
    if (atom.type === ATOM_TYPES.CONTENT_BLOCK) {
      return readPayload(atom, ATOM_TYPES.CONTENT_BLOCK, ContentBlockSchema)
    }
    if (atom.type !== ATOM_TYPES.DOCUMENT) {
      throw new SchemaError(`${this.name} cannot refine '${atom.type}' atoms`)
    }

    const document = readPayload(atom, ATOM_TYPES.DOCUMENT, DocumentPayloadSchema)
    return {
      type: document.format,
      content: document.content,
      metadata: {
        ...document.metadata,
        source: atom.source,
        title: document.title,
        ...(document.description === undefined ? {} : { description: document.description }),
      },
    }
  }

  private clean(block: ContentBlock): ContentBlock {
    if ((block.type !== 'text' && block.type !== 'md') || typeof block.content !== 'string') {
      return block
    }

    let text = block.content
    for (const pattern of this.patterns) {
      text = text.replace(pattern, '')
    }
    if (this.options.normalizeSpace) {
      text = text.replace(SPACE_RUN, ' ')
    }
    return { ...block, content: text.trim() }
  }
}
