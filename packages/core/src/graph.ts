/**
 * KnowledgeGraph - in-memory entity map filled by the Assemble stage.
 *
 * Merge rules for addNode() on an existing id:
 * - attributes merge key-wise, incoming values win
 * - relationship lists concatenate in arrival order, duplicates kept
 *   (collapsing edges is left to writers)
 */

import { z } from 'zod'
import { CoreError, ErrorCodes } from './errors.js'

export const GraphNodeSchema = z.object({
  nodeId: z.string().min(1),
  /** Ontology class, e.g. `gw:Document` */
  nodeClass: z.string().min(1),
  friendlyName: z.string().optional(),
  attributes: z.record(z.unknown()).default({}),
  relationships: z.record(z.array(z.string())).default({}),
})

export type GraphNode = z.infer<typeof GraphNodeSchema>

/**
 * One unit a writer persists, with a stable id for error reporting.
 */
export interface PersistUnit {
  id: string
  record: Record<string, unknown>
}

/**
 * Structure produced by a builder and handed to a writer.
 */
export interface BuiltObject {
  readonly kind: string
  /** Called once at the hand-off; the builder may not mutate it afterwards */
  seal(): void
  units(): Iterable<PersistUnit>
  toJSON(): Record<string, unknown>
}

export interface GraphSummary {
  nodeCount: number
  edgeCount: number
}

export class KnowledgeGraph implements BuiltObject {
  readonly kind = 'knowledge_graph'
  private readonly entities = new Map<string, GraphNode>()
  private sealed = false

  addNode(node: GraphNode): void {
    if (this.sealed) {
      throw new CoreError(
        ErrorCodes.GRAPH_SEALED,
        `Cannot add ${node.nodeId}: graph was already handed to a writer`
      )
    }

    const existing = this.entities.get(node.nodeId)
    if (!existing) {
      this.entities.set(node.nodeId, cloneNode(node))
      return
    }

    const relationships: Record<string, string[]> = { ...existing.relationships }
    for (const [predicate, targets] of Object.entries(node.relationships)) {
      relationships[predicate] = [...(relationships[predicate] ?? []), ...targets]
    }

    this.entities.set(node.nodeId, {
      nodeId: existing.nodeId,
      nodeClass: node.nodeClass,
      friendlyName: node.friendlyName ?? existing.friendlyName,
      attributes: { ...existing.attributes, ...node.attributes },
      relationships,
    })
  }

  getNode(id: string): GraphNode | undefined {
    const node = this.entities.get(id)
    return node ? cloneNode(node) : undefined
  }

  size(): number {
    return this.entities.size
  }

  nodes(): GraphNode[] {
    return [...this.entities.values()].map(cloneNode)
  }

  isSealed(): boolean {
    return this.sealed
  }

  seal(): void {
    this.sealed = true
  }

  summary(): GraphSummary {
    let edgeCount = 0
    for (const node of this.entities.values()) {
      for (const targets of Object.values(node.relationships)) {
        edgeCount += targets.length
      }
    }
    return { nodeCount: this.entities.size, edgeCount }
  }

  *units(): Iterable<PersistUnit> {
    for (const node of this.entities.values()) {
      yield { id: node.nodeId, record: { ...cloneNode(node) } }
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      entities: Object.fromEntries(
        [...this.entities.entries()].map(([id, node]) => [id, cloneNode(node)])
      ),
      summary: this.summary(),
    }
  }
}

function cloneNode(node: GraphNode): GraphNode {
  const relationships: Record<string, string[]> = {}
  for (const [predicate, targets] of Object.entries(node.relationships)) {
    relationships[predicate] = [...targets]
  }
  return {
    nodeId: node.nodeId,
    nodeClass: node.nodeClass,
    ...(node.friendlyName === undefined ? {} : { friendlyName: node.friendlyName }),
    attributes: { ...node.attributes },
    relationships,
  }
}
