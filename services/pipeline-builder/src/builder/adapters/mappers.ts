import {
  ATOM_TYPES,
  Attribute,
  Mapper,
  NodeClass,
  Predicate,
  createAtom,
  readPayload,
  type Atom,
  type GraphNode,
} from '@graphweave/core'
import { z } from 'zod'
import { ChunkPayloadSchema, type ChunkPayload, type SemanticType } from '../payloads.js'
import { shortHash } from '../urls.js'

const NoOptionsSchema = z.object({})

const CLASS_OF_SEMANTIC_TYPE: Record<SemanticType, string> = {
  text: NodeClass.TEXT,
  heading: NodeClass.TEXT,
  record: NodeClass.TEXT,
  table: NodeClass.TABLE,
  code_block: NodeClass.CODE_BLOCK,
  list_item: NodeClass.LIST_ITEM,
}

export function documentNodeId(source: string): string {
  return `doc:${shortHash(source)}`
}

export function topicNodeId(source: string, headingPath: readonly string[]): string {
  return `topic:${shortHash(source)}:${shortHash(headingPath.join('\u0000'))}`
}

export function chunkNodeId(chunkId: string): string {
  return `chunk:${chunkId}`
}

/**
 * Maps chunks onto graph nodes: one Document per source, one Topic per
 * heading path, and one typed fragment per chunk. Fragments point at their
 * parent (`hasParent`), their document (`belongsTo`) and the following
 * fragment of the same source (`next`); parents list children in `contains`.
 */
export class DocumentChunkMapper extends Mapper<z.infer<typeof NoOptionsSchema>> {
  readonly name = 'DocumentChunkMapper'
  protected readonly optionsSchema = NoOptionsSchema

  protected async doTransform(atoms: readonly Atom[]): Promise<Atom[]> {
    const bySource = new Map<string, ChunkPayload[]>()
    for (const atom of atoms) {
      const chunk = readPayload(atom, ATOM_TYPES.CHUNK, ChunkPayloadSchema)
      const list = bySource.get(atom.source) ?? []
      list.push(chunk)
      bySource.set(atom.source, list)
    }

    const output: Atom[] = []
    for (const [source, chunks] of bySource) {
      chunks.sort((a, b) => a.metadata.partIndex - b.metadata.partIndex)
      for (const node of this.mapDocument(source, chunks)) {
        output.push(createAtom(source, ATOM_TYPES.GRAPH_NODE, { ...node }))
      }
    }
    return output
  }

  private mapDocument(source: string, chunks: ChunkPayload[]): GraphNode[] {
    const docId = documentNodeId(source)
    const title = chunks.find((chunk) => chunk.metadata.title)?.metadata.title ?? source
    const nodes: GraphNode[] = [
      {
        nodeId: docId,
        nodeClass: NodeClass.DOCUMENT,
        friendlyName: title,
        attributes: { [Attribute.SOURCE]: source, [Attribute.TITLE]: title },
        relationships: {},
      },
    ]
    const emittedTopics = new Set<string>()

    chunks.forEach((chunk, index) => {
      const parentId = this.ensureTopics(source, docId, chunk.metadata.headingPath, emittedTopics, nodes)
      const nodeId = chunkNodeId(chunk.metadata.chunkId)
      const following = chunks[index + 1]

      nodes.push({
        nodeId,
        nodeClass: CLASS_OF_SEMANTIC_TYPE[chunk.metadata.semanticType],
        friendlyName: `${title} #${chunk.metadata.partIndex}`,
        attributes: {
          [Attribute.TEXT]: chunk.content,
          [Attribute.SEMANTIC_TYPE]: chunk.metadata.semanticType,
          [Attribute.PART_INDEX]: chunk.metadata.partIndex,
          [Attribute.SOURCE]: source,
          [Attribute.HEADING_PATH]: chunk.metadata.headingPath,
          [Attribute.TOKEN_COUNT]: chunk.metadata.tokenCount,
        },
        relationships: {
          [Predicate.HAS_PARENT]: [parentId],
          [Predicate.BELONGS_TO]: [docId],
          ...(following ? { [Predicate.NEXT]: [chunkNodeId(following.metadata.chunkId)] } : {}),
        },
      })
      nodes.push(containsEdge(parentId, parentId === docId ? NodeClass.DOCUMENT : NodeClass.TOPIC, nodeId))
    })

    return nodes
  }

  /** Emits missing Topic nodes along a heading path; returns the innermost parent id */
  private ensureTopics(
    source: string,
    docId: string,
    headingPath: readonly string[],
    emitted: Set<string>,
    nodes: GraphNode[]
  ): string {
    let parentId = docId
    for (let depth = 1; depth <= headingPath.length; depth++) {
      const path = headingPath.slice(0, depth)
      const topicId = topicNodeId(source, path)
      if (!emitted.has(topicId)) {
        emitted.add(topicId)
        const heading = path[path.length - 1] ?? ''
        nodes.push({
          nodeId: topicId,
          nodeClass: NodeClass.TOPIC,
          friendlyName: heading,
          attributes: { [Attribute.TITLE]: heading, [Attribute.HEADING_PATH]: path },
          relationships: { [Predicate.HAS_PARENT]: [parentId] },
        })
        nodes.push(
          containsEdge(parentId, parentId === docId ? NodeClass.DOCUMENT : NodeClass.TOPIC, topicId)
        )
      }
      parentId = topicId
    }
    return parentId
  }
}

function containsEdge(parentId: string, parentClass: string, childId: string): GraphNode {
  return {
    nodeId: parentId,
    nodeClass: parentClass,
    attributes: {},
    relationships: { [Predicate.CONTAINS]: [childId] },
  }
}
