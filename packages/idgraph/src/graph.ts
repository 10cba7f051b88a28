/**
 * Graph
 *
 * Main entry point. A graph owns its layout, its record store, its adjacency
 * index and its identifier free lists; callers hold identifiers, never records
 * they could mutate.
 */

import type { ConsolaInstance } from 'consola'
import { resolveGraphConfig, type GraphConfig, type ResolvedGraphConfig } from './config'
import { breadthFirst, depthFirst, recordsEqual, searchRecords, traverse as walkFrontier, type Selector } from './engine'
import { UnknownIdentifierError } from './errors'
import {
  defineSchema,
  RecordValidator,
  type Attributes,
  type EdgePatch,
  type EdgeRecord,
  type GraphRecord,
  type GraphSchema,
  type Identifier,
  type NodePatch,
  type NodeRecord,
} from './schema'
import { AdjacencyIndex, EntityStore, IdAllocator } from './store'

export interface GraphStats {
  nodes: number
  edges: number
  /** Identifiers queued for reuse, most recent last */
  reusableNodeIds: readonly Identifier[]
  reusableEdgeIds: readonly Identifier[]
}

function includesRecord(records: Iterable<object>, record: object): boolean {
  for (const candidate of records) {
    if (recordsEqual(candidate, record)) return true
  }
  return false
}

export class Graph<N extends string = never, E extends string = never> {
  readonly schema: GraphSchema<N, E>

  private readonly validator: RecordValidator<N, E>
  private readonly store = new EntityStore<N, E>()
  private readonly adjacency = new AdjacencyIndex()
  private readonly ids = new IdAllocator()
  private readonly config: ResolvedGraphConfig
  private readonly log: ConsolaInstance

  /**
   * @example
   * ```typescript
   * const g = new Graph(['name'], ['weight'])
   * const bob = g.addNode({ name: 'bob' })      // 1
   * const ann = g.addNode({ name: 'ann' })      // 2
   * const e = g.addEdge(bob, ann, { weight: 5 }) // -1
   * g.edge(e)                                    // { weight: 5, start: 1, end: 2 }
   * ```
   */
  constructor(nodeAttributes: readonly N[], edgeAttributes: readonly E[] = [], config: GraphConfig = {}) {
    this.schema = defineSchema(nodeAttributes, edgeAttributes)
    this.validator = new RecordValidator(this.schema)
    this.config = resolveGraphConfig(config)
    this.log = this.config.logger
  }

  // ===========================================================================
  // MUTATIONS
  // ===========================================================================

  /**
   * Add a node carrying exactly the declared node attributes.
   * @throws SchemaMismatchError if attributes are missing or unexpected
   */
  addNode(attributes: Attributes<N>): Identifier {
    return this.installNode(this.validator.node(attributes))
  }

  /**
   * Add an edge from `start` to `end`.
   *
   * Endpoints are not checked against the node store: an edge may point at an
   * identifier that is not, or is no longer, a node.
   *
   * @throws SchemaMismatchError if attributes are missing or unexpected
   */
  addEdge(start: Identifier, end: Identifier, attributes?: Attributes<E>): Identifier {
    return this.installEdge(this.validator.buildEdge(start, end, attributes ?? {}))
  }

  /**
   * Replace the named fields of a node, keeping the others.
   * @throws UnknownIdentifierError if the node is not live
   * @throws SchemaMismatchError if a field name is not declared
   */
  modifyNode(id: Identifier, changes: NodePatch<N>): Identifier {
    const current = this.store.getNode(id)
    this.validator.checkNames('node', Object.keys(changes))

    this.store.insertNode(id, this.validator.node({ ...current, ...changes }))
    this.log.debug(`Modified node ${id}`)
    return id
  }

  /**
   * Replace the named fields of an edge, keeping the others.
   * Changing `start` moves the edge to its new source in the adjacency index.
   * @throws UnknownIdentifierError if the edge is not live
   * @throws SchemaMismatchError if a field name is not declared
   */
  modifyEdge(id: Identifier, changes: EdgePatch<E>): Identifier {
    const current = this.store.getEdge(id)
    this.validator.checkNames('edge', Object.keys(changes))

    this.writeEdge(id, current, this.validator.edge({ ...current, ...changes }))
    this.log.debug(`Modified edge ${id}`)
    return id
  }

  /**
   * Remove a node and recycle its identifier.
   *
   * By default edges touching the node stay in the store: its outgoing edges
   * drop out of the adjacency index and incoming edges keep pointing at the
   * old identifier. With `cascadeRemovals` those edges are removed first.
   *
   * @throws UnknownIdentifierError if the node is not live
   */
  removeNode(id: Identifier): NodeRecord<N> {
    if (!this.store.hasNode(id)) {
      throw new UnknownIdentifierError(id, 'node')
    }

    if (this.config.cascadeRemovals) {
      const touching = [...this.store.edgeEntries()]
        .filter(([, edge]) => edge.start === id || edge.end === id)
        .map(([edgeId]) => edgeId)
      for (const edgeId of touching) {
        this.removeEdge(edgeId)
      }
    }

    const unindexed = this.adjacency.outgoing(id).size
    const record = this.store.deleteNode(id)
    this.adjacency.onNodeRemoved(id)
    this.ids.release(id)

    if (unindexed > 0) {
      this.log.debug(`Removed node ${id}; ${unindexed} outgoing edge(s) left dangling`)
    } else {
      this.log.debug(`Removed node ${id}`)
    }
    return record
  }

  /**
   * Remove an edge and recycle its identifier.
   * @throws UnknownIdentifierError if the edge is not live
   */
  removeEdge(id: Identifier): EdgeRecord<E> {
    const record = this.store.deleteEdge(id)
    this.adjacency.onEdgeRemoved(id, record.start)
    this.ids.release(id)
    this.log.debug(`Removed edge ${id}`)
    return record
  }

  // ===========================================================================
  // ELEMENT ACCESS
  // ===========================================================================

  /**
   * Record behind an identifier; the sign picks the node or edge store.
   * @throws UnknownIdentifierError if nothing is stored under `id`
   */
  get(id: Identifier): GraphRecord<N, E> {
    return id > 0 ? this.store.getNode(id) : this.store.getEdge(id)
  }

  node(id: Identifier): NodeRecord<N> {
    return this.store.getNode(id)
  }

  edge(id: Identifier): EdgeRecord<E> {
    return this.store.getEdge(id)
  }

  /**
   * Install a complete replacement record under a live identifier.
   */
  set(id: Identifier, replacement: GraphRecord<N, E>): void {
    if (id > 0) {
      this.putNode(id, replacement)
    } else {
      this.putEdge(id, replacement)
    }
  }

  /**
   * @throws UnknownIdentifierError if the node is not live
   * @throws SchemaMismatchError if the replacement does not match the node layout
   */
  replaceNode(id: Identifier, replacement: NodeRecord<N>): void {
    this.putNode(id, replacement)
  }

  /**
   * @throws UnknownIdentifierError if the edge is not live
   * @throws SchemaMismatchError if the replacement does not match the edge layout
   */
  replaceEdge(id: Identifier, replacement: EdgeRecord<E>): void {
    this.putEdge(id, replacement)
  }

  /**
   * Remove whatever `id` names and return its record.
   */
  delete(id: Identifier): GraphRecord<N, E> {
    return id > 0 ? this.removeNode(id) : this.removeEdge(id)
  }

  /**
   * Whether an identifier is live.
   */
  contains(id: Identifier): boolean {
    return id > 0 ? this.store.hasNode(id) : this.store.hasEdge(id)
  }

  /**
   * Whether an equal record is stored, as a node or as an edge.
   */
  has(record: GraphRecord<N, E>): boolean {
    return includesRecord(this.store.nodes(), record) || includesRecord(this.store.edges(), record)
  }

  hasNode(record: NodeRecord<N>): boolean {
    return includesRecord(this.store.nodes(), record)
  }

  hasEdge(record: EdgeRecord<E>): boolean {
    return includesRecord(this.store.edges(), record)
  }

  // ===========================================================================
  // ENUMERATION
  // ===========================================================================

  nodeIds(): IterableIterator<Identifier> {
    return this.store.nodeIds()
  }

  edgeIds(): IterableIterator<Identifier> {
    return this.store.edgeIds()
  }

  nodes(): IterableIterator<NodeRecord<N>> {
    return this.store.nodes()
  }

  edges(): IterableIterator<EdgeRecord<E>> {
    return this.store.edges()
  }

  /** Number of live nodes */
  order(): number {
    return this.store.nodeCount
  }

  /** Number of live edges */
  size(): number {
    return this.store.edgeCount
  }

  stats(): GraphStats {
    const pending = this.ids.pending()
    return {
      nodes: this.store.nodeCount,
      edges: this.store.edgeCount,
      reusableNodeIds: pending.nodes,
      reusableEdgeIds: pending.edges,
    }
  }

  /**
   * Drop every node, edge and free identifier.
   */
  clear(): void {
    this.store.clear()
    this.adjacency.clear()
    this.ids.clear()
  }

  // ===========================================================================
  // ADJACENCY
  // ===========================================================================

  /**
   * Identifiers of the indexed edges leaving `id`.
   */
  *outgoingIds(id: Identifier): Generator<Identifier, void, undefined> {
    yield* this.adjacency.outgoing(id)
  }

  *outgoingEdges(id: Identifier): Generator<EdgeRecord<E>, void, undefined> {
    for (const edgeId of this.adjacency.outgoing(id)) {
      yield this.store.getEdge(edgeId)
    }
  }

  /**
   * `id` itself, then the `end` of each indexed outgoing edge.
   */
  *adjacentIds(id: Identifier): Generator<Identifier, void, undefined> {
    yield id
    for (const edgeId of this.adjacency.outgoing(id)) {
      yield this.store.getEdge(edgeId).end
    }
  }

  /**
   * Records for `adjacentIds`.
   * @throws UnknownIdentifierError on reaching a dangling edge end
   */
  *adjacentNodes(id: Identifier): Generator<NodeRecord<N>, void, undefined> {
    for (const nodeId of this.adjacentIds(id)) {
      yield this.store.getNode(nodeId)
    }
  }

  /**
   * Edges whose `start` or `end` is not a live node.
   */
  *danglingEdgeIds(): Generator<Identifier, void, undefined> {
    for (const [edgeId, edge] of this.store.edgeEntries()) {
      if (!this.store.hasNode(edge.start) || !this.store.hasNode(edge.end)) {
        yield edgeId
      }
    }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Nodes where any of the given attributes is equal (`===`).
   * Each call starts a fresh scan.
   * @throws SchemaMismatchError if a name is not declared
   */
  searchNodes(predicate: NodePatch<N>): IterableIterator<NodeRecord<N>> {
    this.validator.checkNames('node', Object.keys(predicate))
    return searchRecords(this.store.nodes(), predicate)
  }

  /**
   * Edges where any of the given attributes, endpoints included, is equal (`===`).
   * @throws SchemaMismatchError if a name is not declared
   */
  searchEdges(predicate: EdgePatch<E>): IterableIterator<EdgeRecord<E>> {
    this.validator.checkNames('edge', Object.keys(predicate))
    return searchRecords(this.store.edges(), predicate)
  }

  // ===========================================================================
  // TRAVERSALS
  // ===========================================================================

  /**
   * Walk from `root` with a custom frontier selector.
   * @throws UnknownIdentifierError if `root` is not a live node
   */
  traverse(root: Identifier, selector: Selector): IterableIterator<Identifier> {
    if (!this.store.hasNode(root)) {
      throw new UnknownIdentifierError(root, 'node')
    }
    return walkFrontier(root, (id) => this.adjacentIds(id), selector)
  }

  depthFirstTraversal(root: Identifier): IterableIterator<Identifier> {
    return this.traverse(root, depthFirst)
  }

  breadthFirstTraversal(root: Identifier): IterableIterator<Identifier> {
    return this.traverse(root, breadthFirst)
  }

  // ===========================================================================
  // SUBGRAPHS
  // ===========================================================================

  /**
   * Copy the given nodes, and the indexed edges running between them, into a
   * new independent graph with the same layout and options.
   *
   * Identifiers in the result are fresh: nodes are numbered in argument order
   * (repeats collapse), edges in the order they are found leaving each node.
   *
   * @throws UnknownIdentifierError if an identifier is not a live node
   */
  generateSubgraph(...nodeIds: Identifier[]): Graph<N, E> {
    const subgraph = new Graph<N, E>(this.schema.nodeAttributes, this.schema.edgeAttributes, this.config)
    const mapping = new Map<Identifier, Identifier>()

    for (const id of nodeIds) {
      if (mapping.has(id)) continue
      mapping.set(id, subgraph.installNode(this.store.getNode(id)))
    }

    for (const [sourceId, start] of mapping) {
      for (const edgeId of this.adjacency.outgoing(sourceId)) {
        const { start: _start, end: sourceEnd, ...attributes } = this.store.getEdge(edgeId)
        const end = mapping.get(sourceEnd)
        if (end === undefined) continue
        subgraph.installEdge(subgraph.validator.buildEdge(start, end, attributes))
      }
    }

    this.log.debug(`Extracted subgraph of ${subgraph.order()} node(s) and ${subgraph.size()} edge(s)`)
    return subgraph
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  /**
   * Store a validated node under a fresh identifier.
   * Allocation happens last, so a rejected record never consumes an identifier.
   */
  private installNode(record: NodeRecord<N>): Identifier {
    const id = this.ids.allocateNode(this.store.nodeCount)
    this.store.insertNode(id, record)
    this.log.debug(`Added node ${id}`)
    return id
  }

  private installEdge(record: EdgeRecord<E>): Identifier {
    const id = this.ids.allocateEdge(this.store.edgeCount)
    this.store.insertEdge(id, record)
    this.adjacency.onEdgeAdded(id, record.start)
    this.log.debug(`Added edge ${id} (${record.start} -> ${record.end})`)
    return id
  }

  private putNode(id: Identifier, replacement: unknown): void {
    if (!this.store.hasNode(id)) {
      throw new UnknownIdentifierError(id, 'node')
    }
    this.store.insertNode(id, this.validator.node(replacement))
    this.log.debug(`Replaced node ${id}`)
  }

  private putEdge(id: Identifier, replacement: unknown): void {
    const current = this.store.getEdge(id)
    this.writeEdge(id, current, this.validator.edge(replacement))
    this.log.debug(`Replaced edge ${id}`)
  }

  private writeEdge(id: Identifier, current: EdgeRecord<E>, replacement: EdgeRecord<E>): void {
    this.store.insertEdge(id, replacement)
    this.adjacency.onEdgeRelocated(id, current.start, replacement.start)
  }
}

/**
 * Create a graph whose nodes and edges carry the given attribute names.
 */
export function createGraph<N extends string = never, E extends string = never>(
  nodeAttributes: readonly N[],
  edgeAttributes: readonly E[] = [],
  config: GraphConfig = {},
): Graph<N, E> {
  return new Graph(nodeAttributes, edgeAttributes, config)
}
