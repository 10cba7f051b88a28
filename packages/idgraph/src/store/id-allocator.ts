/**
 * Identifier Allocator
 *
 * Issues node identifiers from 1 upwards and edge identifiers from -1
 * downwards. Released identifiers go onto a per-kind stack and are reissued
 * last-in, first-out before any fresh value.
 *
 * Fresh values are derived from the live count, which stays collision-free
 * because live identifiers plus free identifiers always cover 1..max exactly.
 */

import type { Identifier } from '../schema/types'

export class IdAllocator {
  /** Released node identifiers (positive) */
  private freeNodeIds: Identifier[] = []

  /** Released edge identifiers (negative) */
  private freeEdgeIds: Identifier[] = []

  /**
   * Next node identifier, given how many nodes are live.
   */
  allocateNode(liveNodes: number): Identifier {
    return this.freeNodeIds.pop() ?? liveNodes + 1
  }

  /**
   * Next edge identifier, given how many edges are live.
   */
  allocateEdge(liveEdges: number): Identifier {
    return this.freeEdgeIds.pop() ?? -(liveEdges + 1)
  }

  /**
   * Return an identifier to the free list of its kind.
   */
  release(id: Identifier): void {
    if (id > 0) {
      this.freeNodeIds.push(id)
    } else if (id < 0) {
      this.freeEdgeIds.push(id)
    }
  }

  /**
   * Free identifiers waiting for reuse, most recent last.
   */
  pending(): { nodes: readonly Identifier[]; edges: readonly Identifier[] } {
    return { nodes: [...this.freeNodeIds], edges: [...this.freeEdgeIds] }
  }

  clear(): void {
    this.freeNodeIds = []
    this.freeEdgeIds = []
  }
}
