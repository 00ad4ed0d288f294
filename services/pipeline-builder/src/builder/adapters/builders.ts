import {
  ATOM_TYPES,
  Builder,
  GraphNodeSchema,
  KnowledgeGraph,
  readPayload,
  type Atom,
  type BuiltObject,
} from '@graphweave/core'
import { z } from 'zod'

const NoOptionsSchema = z.object({})

/**
 * Folds graph_node atoms into a KnowledgeGraph, merging repeated node ids.
 */
export class GraphBuilder extends Builder<z.infer<typeof NoOptionsSchema>> {
  readonly name = 'GraphBuilder'
  protected readonly optionsSchema = NoOptionsSchema

  protected async doBuild(atoms: readonly Atom[]): Promise<BuiltObject> {
    const graph = new KnowledgeGraph()
    for (const atom of atoms) {
      graph.addNode(readPayload(atom, ATOM_TYPES.GRAPH_NODE, GraphNodeSchema))
    }

    const { nodeCount, edgeCount } = graph.summary()
    this.logger.info(`[${this.name}] Assembled ${nodeCount} nodes, ${edgeCount} edges`)
    return graph
  }
}
