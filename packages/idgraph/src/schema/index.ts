/**
 * Schema Module
 */

export { defineSchema } from './builders'
export { RecordValidator, identifierSchema } from './validation'
export { REQUIRED_EDGE_ATTRIBUTES } from './types'
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
} from './types'
