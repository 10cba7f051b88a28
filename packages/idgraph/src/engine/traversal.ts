/**
 * Traversal Engine
 *
 * One worklist algorithm drives every walk. The frontier holds identifiers
 * waiting to be visited; a selector decides which one comes out next, which
 * is the only difference between depth-first and breadth-first order.
 *
 * Frontier and visited membership are hash lookups, so expanding a node costs
 * O(out-degree) regardless of how large the frontier has grown.
 */

import { TraversalError } from '../errors'
import type { Identifier } from '../schema/types'

// =============================================================================
// FRONTIER
// =============================================================================

/**
 * Ordered worklist with constant-time membership.
 *
 * Removal from the front advances a head offset instead of shifting the array.
 */
export class Frontier {
  private items: Identifier[] = []
  private head = 0
  private readonly members = new Set<Identifier>()

  constructor(seed: Iterable<Identifier> = []) {
    for (const id of seed) this.push(id)
  }

  get size(): number {
    return this.members.size
  }

  has(id: Identifier): boolean {
    return this.members.has(id)
  }

  push(id: Identifier): void {
    if (this.members.has(id)) return
    this.items.push(id)
    this.members.add(id)
  }

  /**
   * Remove the oldest identifier (queue discipline).
   */
  takeFirst(): Identifier | undefined {
    if (this.head >= this.items.length) return undefined
    const id = this.items[this.head]
    this.head++
    return this.release(id)
  }

  /**
   * Remove the newest identifier (stack discipline).
   */
  takeLast(): Identifier | undefined {
    if (this.head >= this.items.length) return undefined
    return this.release(this.items.pop())
  }

  /**
   * Remove a specific identifier, wherever it sits.
   */
  take(id: Identifier): Identifier | undefined {
    if (!this.members.has(id)) return undefined
    const index = this.items.indexOf(id, this.head)
    this.items.splice(index, 1)
    return this.release(id)
  }

  /**
   * Pending identifiers, oldest first.
   */
  ids(): Identifier[] {
    return this.items.slice(this.head)
  }

  private release(id: Identifier | undefined): Identifier | undefined {
    if (id === undefined) return undefined
    this.members.delete(id)
    if (this.head >= this.items.length) {
      this.items = []
      this.head = 0
    }
    return id
  }
}

// =============================================================================
// SELECTORS
// =============================================================================

/**
 * Removes exactly one identifier from the frontier and returns it.
 */
export type Selector = (frontier: Frontier) => Identifier | undefined

export const depthFirst: Selector = (frontier) => frontier.takeLast()

export const breadthFirst: Selector = (frontier) => frontier.takeFirst()

export type Neighbors = (id: Identifier) => Iterable<Identifier>

// =============================================================================
// WALK
// =============================================================================

/**
 * Generalized worklist walk from `root`.
 *
 * Each selected identifier is yielded, then marked visited, then expanded:
 * neighbors already pending or visited are skipped, so nothing is yielded twice.
 * The walk is lazy and never touches the graph it reads from.
 *
 * @throws TraversalError if the selector does not remove exactly one pending identifier
 */
export function* traverse(
  root: Identifier,
  neighbors: Neighbors,
  selector: Selector,
): Generator<Identifier, void, undefined> {
  const frontier = new Frontier([root])
  const visited = new Set<Identifier>()

  while (frontier.size > 0) {
    const before = frontier.size
    const next = selector(frontier)
    if (next === undefined || frontier.size !== before - 1 || frontier.has(next) || visited.has(next)) {
      throw new TraversalError(`Selector must remove exactly one pending identifier (got ${String(next)})`, root)
    }

    yield next
    visited.add(next)

    for (const id of neighbors(next)) {
      if (!frontier.has(id) && !visited.has(id)) {
        frontier.push(id)
      }
    }
  }
}
