/**
 * Schema Type Definitions
 *
 * Layout types for a graph whose attribute names are fixed at construction.
 * Attribute names are string literal unions, so field access on records is
 * checked at compile time while values stay opaque.
 */

// =============================================================================
// IDENTIFIERS
// =============================================================================

/**
 * Opaque element identifier.
 * Positive values name nodes, negative values name edges. `0` is never issued.
 */
export type Identifier = number

export type ElementKind = 'node' | 'edge'

/**
 * Attributes every edge carries regardless of the declared layout.
 */
export const REQUIRED_EDGE_ATTRIBUTES = ['start', 'end'] as const

export type RequiredEdgeAttribute = (typeof REQUIRED_EDGE_ATTRIBUTES)[number]

// =============================================================================
// RECORDS
// =============================================================================

/**
 * Declared attribute values, keyed by name.
 */
export type Attributes<K extends string> = { readonly [P in K]: unknown }

export interface EdgeEndpoints {
  readonly start: Identifier
  readonly end: Identifier
}

/**
 * Immutable node value. Replaced wholesale on modification.
 */
export type NodeRecord<N extends string> = Attributes<N>

/**
 * Immutable edge value: endpoints plus declared attributes.
 */
export type EdgeRecord<E extends string> = EdgeEndpoints & Attributes<E>

export type GraphRecord<N extends string, E extends string> = NodeRecord<N> | EdgeRecord<E>

/**
 * Field-wise patch accepted by modify operations and searches.
 */
export type NodePatch<N extends string> = Partial<NodeRecord<N>>

export type EdgePatch<E extends string> = Partial<EdgeRecord<E>>

// =============================================================================
// SCHEMA
// =============================================================================

/**
 * Fixed attribute layout of one graph instance.
 */
export interface GraphSchema<N extends string, E extends string> {
  /** Declared node attribute names, in declaration order */
  readonly nodeAttributes: readonly N[]
  /** Declared edge attribute names, in declaration order */
  readonly edgeAttributes: readonly E[]
  /** Full node layout */
  readonly nodeFields: readonly N[]
  /** Full edge layout, endpoints first */
  readonly edgeFields: ReadonlyArray<RequiredEdgeAttribute | E>
}
