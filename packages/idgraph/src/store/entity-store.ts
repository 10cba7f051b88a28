/**
 * Entity Store
 *
 * Identifier-keyed storage for node and edge records. Records are frozen
 * values, so the store hands them out directly instead of cloning.
 */

import { UnknownIdentifierError } from '../errors'
import type { EdgeRecord, Identifier, NodeRecord } from '../schema/types'

export class EntityStore<N extends string, E extends string> {
  /** All nodes by identifier, in insertion order */
  private readonly nodeRecords = new Map<Identifier, NodeRecord<N>>()

  /** All edges by identifier, in insertion order */
  private readonly edgeRecords = new Map<Identifier, EdgeRecord<E>>()

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  /**
   * Get a node by identifier.
   * @throws UnknownIdentifierError if the node is not live
   */
  getNode(id: Identifier): NodeRecord<N> {
    const node = this.nodeRecords.get(id)
    if (!node) {
      throw new UnknownIdentifierError(id, 'node')
    }
    return node
  }

  /**
   * Create or overwrite a node. The identifier must come from the allocator.
   */
  insertNode(id: Identifier, record: NodeRecord<N>): void {
    this.nodeRecords.set(id, record)
  }

  /**
   * Remove a node and return its last record.
   * @throws UnknownIdentifierError if the node is not live
   */
  deleteNode(id: Identifier): NodeRecord<N> {
    const node = this.getNode(id)
    this.nodeRecords.delete(id)
    return node
  }

  hasNode(id: Identifier): boolean {
    return this.nodeRecords.has(id)
  }

  nodeIds(): IterableIterator<Identifier> {
    return this.nodeRecords.keys()
  }

  nodes(): IterableIterator<NodeRecord<N>> {
    return this.nodeRecords.values()
  }

  get nodeCount(): number {
    return this.nodeRecords.size
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  /**
   * Get an edge by identifier.
   * @throws UnknownIdentifierError if the edge is not live
   */
  getEdge(id: Identifier): EdgeRecord<E> {
    const edge = this.edgeRecords.get(id)
    if (!edge) {
      throw new UnknownIdentifierError(id, 'edge')
    }
    return edge
  }

  insertEdge(id: Identifier, record: EdgeRecord<E>): void {
    this.edgeRecords.set(id, record)
  }

  /**
   * Remove an edge and return its last record.
   * @throws UnknownIdentifierError if the edge is not live
   */
  deleteEdge(id: Identifier): EdgeRecord<E> {
    const edge = this.getEdge(id)
    this.edgeRecords.delete(id)
    return edge
  }

  hasEdge(id: Identifier): boolean {
    return this.edgeRecords.has(id)
  }

  edgeIds(): IterableIterator<Identifier> {
    return this.edgeRecords.keys()
  }

  edges(): IterableIterator<EdgeRecord<E>> {
    return this.edgeRecords.values()
  }

  edgeEntries(): IterableIterator<[Identifier, EdgeRecord<E>]> {
    return this.edgeRecords.entries()
  }

  get edgeCount(): number {
    return this.edgeRecords.size
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  clear(): void {
    this.nodeRecords.clear()
    this.edgeRecords.clear()
  }
}
