/**
 * idgraph
 *
 * Schema-flexible in-memory graph addressed through integer identifiers.
 *
 * @example
 * ```typescript
 * import { Graph } from 'idgraph'
 *
 * // named nodes, weighted edges
 * const g = new Graph(['name'], ['weight'])
 *
 * const bob = g.addNode({ name: 'bob' })   // 1
 * const ann = g.addNode({ name: 'ann' })   // 2
 * const trip = g.addEdge(bob, ann, { weight: 5 }) // -1
 *
 * g.node(bob)  // { name: 'bob' }
 * g.edge(trip) // { weight: 5, start: 1, end: 2 }
 *
 * for (const id of g.depthFirstTraversal(bob)) {
 *   console.log(g.node(id).name)
 * }
 *
 * const pair = g.generateSubgraph(bob, ann) // independent copy
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MAIN API
// =============================================================================

export { Graph, createGraph } from './graph'
export type { GraphStats } from './graph'
export { resolveGraphConfig, defaultGraphConfig } from './config'
export type { GraphConfig, ResolvedGraphConfig } from './config'

// =============================================================================
// SCHEMA
// =============================================================================

export { defineSchema, RecordValidator, identifierSchema, REQUIRED_EDGE_ATTRIBUTES } from './schema'
export type {
  Identifier,
  ElementKind,
  RequiredEdgeAttribute,
  Attributes,
  EdgeEndpoints,
  NodeRecord,
  EdgeRecord,
  GraphRecord,
  NodePatch,
  EdgePatch,
  GraphSchema,
} from './schema'

// =============================================================================
// STORE & ENGINE (for advanced use cases)
// =============================================================================

export { IdAllocator, EntityStore, AdjacencyIndex } from './store'
export { traverse, Frontier, depthFirst, breadthFirst, searchRecords, matchesAny, recordsEqual } from './engine'
export type { Selector, Neighbors } from './engine'

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export {
  GraphError,
  SchemaMismatchError,
  UnknownIdentifierError,
  TraversalError,
  ConfigurationError,
} from './errors'
export { createLogger, setLogLevel, LogLevels } from './utils/logger'
