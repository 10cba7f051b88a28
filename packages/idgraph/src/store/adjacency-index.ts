/**
 * Adjacency Index
 *
 * Outgoing edges per node: nodeId -> Set<edgeId>.
 *
 * Invariant: `outgoing(n)` holds exactly the edges whose `start` is `n`, except
 * after `onNodeRemoved(n)`, which drops the entry while those edges may live on.
 * Every hook must run in the same call as the store mutation it mirrors.
 */

import type { Identifier } from '../schema/types'

const EMPTY: ReadonlySet<Identifier> = new Set()

export class AdjacencyIndex {
  private readonly outEdges = new Map<Identifier, Set<Identifier>>()

  /**
   * Outgoing edge identifiers of a node; empty for a node never seen.
   */
  outgoing(nodeId: Identifier): ReadonlySet<Identifier> {
    return this.outEdges.get(nodeId) ?? EMPTY
  }

  onEdgeAdded(edgeId: Identifier, start: Identifier): void {
    let edges = this.outEdges.get(start)
    if (!edges) {
      edges = new Set()
      this.outEdges.set(start, edges)
    }
    edges.add(edgeId)
  }

  onEdgeRelocated(edgeId: Identifier, oldStart: Identifier, newStart: Identifier): void {
    if (oldStart === newStart) return
    this.onEdgeRemoved(edgeId, oldStart)
    this.onEdgeAdded(edgeId, newStart)
  }

  onEdgeRemoved(edgeId: Identifier, start: Identifier): void {
    const edges = this.outEdges.get(start)
    if (!edges) return

    edges.delete(edgeId)
    if (edges.size === 0) {
      this.outEdges.delete(start)
    }
  }

  /**
   * Drop the node's entry. Edges elsewhere that reference the node are untouched.
   */
  onNodeRemoved(nodeId: Identifier): void {
    this.outEdges.delete(nodeId)
  }

  clear(): void {
    this.outEdges.clear()
  }
}
