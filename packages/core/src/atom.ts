/**
 * Atom - the standard record exchanged between pipeline stages.
 *
 * Atoms are frozen at construction. A stage that wants to change one builds a
 * new atom, so a retried stage always sees the inputs it saw the first time.
 */

import crypto from 'crypto'
import { z } from 'zod'
import { SchemaError } from './errors.js'

export type AtomPayload = Readonly<Record<string, unknown>>

export interface Atom {
  /** Where the record came from (identifier, URI, upstream component) */
  readonly source: string
  /** Payload discriminator, e.g. `raw`, `document`, `chunk`, `graph_node` */
  readonly type: string
  readonly payload: AtomPayload
  readonly atomId: string
  /** RFC 3339 creation time */
  readonly timestamp: string
}

export type AtomRecord = {
  source: string
  type: string
  payload: Record<string, unknown>
  atomId: string
  timestamp: string
}

export const AtomRecordSchema = z.object({
  source: z.string(),
  type: z.string(),
  payload: z.record(z.unknown()),
  atomId: z.string().uuid().optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
})

export function createAtom(
  source: string,
  type: string,
  payload: Record<string, unknown>
): Atom {
  return freezeAtom({
    source,
    type,
    payload: { ...payload },
    atomId: crypto.randomUUID(),
    timestamp: new Date().toISOString(),
  })
}

/**
 * Rebuild an atom from its record form (e.g. a parsed JSON line).
 * Records without an id or timestamp get fresh ones.
 */
export function atomFromRecord(record: unknown): Atom {
  const parsed = AtomRecordSchema.safeParse(record)
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)')
    throw new SchemaError(`Invalid atom record: ${[...new Set(fields)].join(', ')}`, {
      cause: parsed.error,
      suggestion: 'Atom records need string source and type plus an object payload',
    })
  }

  const { source, type, payload, atomId, timestamp } = parsed.data
  return freezeAtom({
    source,
    type,
    payload,
    atomId: atomId ?? crypto.randomUUID(),
    timestamp: timestamp ?? new Date().toISOString(),
  })
}

export function atomToRecord(atom: Atom): AtomRecord {
  return {
    source: atom.source,
    type: atom.type,
    payload: { ...atom.payload },
    atomId: atom.atomId,
    timestamp: atom.timestamp,
  }
}

/**
 * Copy of `atom` with a different type/payload. The derived atom gets its own
 * id; provenance is kept in `source`.
 */
export function deriveAtom(
  atom: Atom,
  type: string,
  payload: Record<string, unknown>
): Atom {
  return createAtom(atom.source, type, payload)
}

function freezeAtom(atom: AtomRecord): Atom {
  Object.freeze(atom.payload)
  return Object.freeze(atom)
}
