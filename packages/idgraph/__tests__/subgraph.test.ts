/**
 * Subgraph Tests
 */

import { describe, it, expect } from 'vitest'
import { UnknownIdentifierError } from '../src'
import { labels, letterGraph } from './fixtures/graphs'

describe('generateSubgraph()', () => {
  it('should renumber nodes in argument order', () => {
    const { graph, ids } = letterGraph()
    const sub = graph.generateSubgraph(ids.B, ids.D, ids.F, ids.E)

    expect([...sub.nodeIds()]).toEqual([1, 2, 3, 4])
    expect(labels(sub, sub.nodeIds())).toEqual(['B', 'D', 'F', 'E'])
  })

  it('should copy only edges with both ends selected', () => {
    const { graph, ids } = letterGraph()
    const sub = graph.generateSubgraph(ids.B, ids.D, ids.F, ids.E)

    expect([...sub.edgeIds()]).toEqual([-1, -2, -3])
    expect([...sub.edges()]).toEqual([
      { start: 1, end: 2, weight: 2 },
      { start: 1, end: 3, weight: 3 },
      { start: 3, end: 4, weight: 4 },
    ])
    expect([...sub.outgoingIds(1)]).toEqual([-1, -2])
  })

  it('should group edges by start node in argument order', () => {
    const { graph, ids } = letterGraph()
    const sub = graph.generateSubgraph(ids.F, ids.E, ids.A, ids.B)

    expect([...sub.edges()]).toEqual([
      { start: 1, end: 2, weight: 4 },
      { start: 3, end: 4, weight: 1 },
      { start: 3, end: 2, weight: 7 },
      { start: 4, end: 1, weight: 3 },
    ])
  })

  it('should collapse repeated identifiers', () => {
    const { graph, ids } = letterGraph()
    const sub = graph.generateSubgraph(ids.C, ids.G, ids.C)

    expect(sub.order()).toBe(2)
    expect([...sub.edges()]).toEqual([{ start: 1, end: 2, weight: 6 }])
  })

  it('should keep self-loops', () => {
    const { graph, ids } = letterGraph()
    graph.addEdge(ids.G, ids.G, { weight: 0 })

    expect([...graph.generateSubgraph(ids.G).edges()]).toEqual([{ start: 1, end: 1, weight: 0 }])
  })

  it('should be independent of the source', () => {
    const { graph, ids } = letterGraph()
    const sub = graph.generateSubgraph(ids.A, ids.B)

    sub.modifyNode(1, { label: 'changed' })
    sub.addNode({ label: 'H' })
    graph.removeNode(ids.B)

    expect(graph.node(ids.A)).toEqual({ label: 'A' })
    expect(graph.order()).toBe(6)
    expect(sub.node(2)).toEqual({ label: 'B' })
    expect(sub.order()).toBe(3)
  })

  it('should keep the layout of the source', () => {
    const { graph, ids } = letterGraph()
    const sub = graph.generateSubgraph(ids.A)

    expect(sub.schema).toEqual(graph.schema)
    expect(() => sub.addEdge(1, 1)).toThrow('missing field names: weight')
  })

  it('should return an empty graph for no identifiers', () => {
    const { graph } = letterGraph()
    expect(graph.generateSubgraph().stats()).toEqual({ nodes: 0, edges: 0, reusableNodeIds: [], reusableEdgeIds: [] })
  })

  it('should reject identifiers that are not live nodes', () => {
    const { graph, ids } = letterGraph()

    expect(() => graph.generateSubgraph(ids.A, 8)).toThrow(UnknownIdentifierError)
    expect(() => graph.generateSubgraph(-1)).toThrow('Unknown node identifier: -1')
  })

  it('should not copy orphaned edges', () => {
    const { graph, ids } = letterGraph()
    graph.removeNode(ids.F)
    const reborn = graph.addNode({ label: 'F2' })

    const sub = graph.generateSubgraph(reborn, ids.E)

    expect(sub.order()).toBe(2)
    expect(sub.size()).toBe(0)
  })
})
