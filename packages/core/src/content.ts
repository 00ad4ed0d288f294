import { z } from 'zod'
import { createAtom, type Atom } from './atom.js'
import { SchemaError } from './errors.js'

export const ATOM_TYPES = {
  RAW: 'raw',
  DOCUMENT: 'document',
  CONTENT_BLOCK: 'content_block',
  CHUNK: 'chunk',
  GRAPH_NODE: 'graph_node',
} as const

export const ContentBlockSchema = z.object({
  /** Block kind, e.g. `text`, `md`, `record`, `table` */
  type: z.string().min(1),
  content: z.union([z.string(), z.record(z.unknown()), z.array(z.unknown())]),
  metadata: z.record(z.unknown()).default({}),
})

/**
 * Normalized unit produced by refinement and consumed by splitters.
 */
export type ContentBlock = z.infer<typeof ContentBlockSchema>

export function toBlockAtom(source: string, block: ContentBlock): Atom {
  return createAtom(source, ATOM_TYPES.CONTENT_BLOCK, { ...block })
}

export function readBlock(atom: Atom): ContentBlock {
  return readPayload(atom, ATOM_TYPES.CONTENT_BLOCK, ContentBlockSchema)
}

/**
 * Validate an atom's payload against the schema its type implies.
 */
export function readPayload<T extends z.ZodTypeAny>(
  atom: Atom,
  expectedType: string,
  schema: T
): z.infer<T> {
  if (atom.type !== expectedType) {
    throw new SchemaError(
      `Expected a '${expectedType}' atom, got '${atom.type}' (${atom.atomId})`
    )
  }
  const parsed = schema.safeParse(atom.payload)
  if (!parsed.success) {
    throw new SchemaError(`Malformed '${expectedType}' payload in atom ${atom.atomId}`, {
      cause: parsed.error,
    })
  }
  return parsed.data
}
