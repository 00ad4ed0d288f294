/**
 * Payload shapes the built-in adapters exchange through atoms.
 */

import { z } from 'zod'

/** `raw` atoms - one fetched resource */
export const RawPayloadSchema = z.object({
  identifier: z.string(),
  content: z.string(),
  contentType: z.string().optional(),
  depth: z.number().int().nonnegative().default(0),
  metadata: z.record(z.unknown()).default({}),
})

export type RawPayload = z.infer<typeof RawPayloadSchema>

export const DocumentFormatSchema = z.enum(['md', 'text', 'record'])

export type DocumentFormat = z.infer<typeof DocumentFormatSchema>

/** `document` atoms - parsed resource, before cleaning */
export const DocumentPayloadSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  format: DocumentFormatSchema,
  content: z.union([z.string(), z.record(z.unknown()), z.array(z.unknown())]),
  metadata: z.record(z.unknown()).default({}),
})

export type DocumentPayload = z.infer<typeof DocumentPayloadSchema>

export const SemanticTypeSchema = z.enum([
  'text',
  'heading',
  'table',
  'code_block',
  'list_item',
  'record',
])

export type SemanticType = z.infer<typeof SemanticTypeSchema>

/** `chunk` atoms - one retrieval unit */
export const ChunkPayloadSchema = z.object({
  content: z.string(),
  metadata: z.object({
    chunkId: z.string(),
    /** Source identifier of the document the chunk came from */
    source: z.string(),
    title: z.string().default(''),
    partIndex: z.number().int().nonnegative(),
    semanticType: SemanticTypeSchema.default('text'),
    heading: z.string().default(''),
    headingPath: z.array(z.string()).default([]),
    tokenCount: z.number().int().nonnegative().default(0),
  }),
})

export type ChunkPayload = z.infer<typeof ChunkPayloadSchema>
export type ChunkPayloadInput = z.input<typeof ChunkPayloadSchema>
