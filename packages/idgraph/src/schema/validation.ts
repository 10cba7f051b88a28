/**
 * Record Validation
 *
 * Runtime checks that attribute sets match a graph's layout exactly.
 * Every record leaving this module is a fresh frozen object.
 */

import { z } from 'zod'
import { SchemaMismatchError } from '../errors'
import {
  REQUIRED_EDGE_ATTRIBUTES,
  type EdgeRecord,
  type ElementKind,
  type GraphSchema,
  type Identifier,
  type NodeRecord,
  type RequiredEdgeAttribute,
} from './types'

// =============================================================================
// FIELD SETS
// =============================================================================

type FieldSetSchema<K extends string> = z.ZodEffects<
  z.ZodRecord<z.ZodString, z.ZodUnknown>,
  Record<string, unknown> & Record<K, unknown>
>

/**
 * Accepts a plain object whose own keys are exactly `fields`.
 * A field holding `undefined` counts as missing, as does one only inherited
 * from the prototype.
 */
function fieldSetSchema<K extends string>(fields: readonly K[]): FieldSetSchema<K> {
  const allowed = new Set<string>(fields)

  return z
    .record(z.unknown())
    .superRefine((data, ctx): data is Record<string, unknown> & Record<K, unknown> => {
      const unexpected = Object.keys(data).filter((key) => !allowed.has(key))
      if (unexpected.length > 0) {
        ctx.addIssue({ code: z.ZodIssueCode.unrecognized_keys, keys: unexpected })
      }

      let complete = true
      for (const field of fields) {
        if (!Object.hasOwn(data, field) || data[field] === undefined) {
          complete = false
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: `Missing field '${field}'` })
        }
      }

      return unexpected.length === 0 && complete
    })
}

export const identifierSchema = z.number().int()

const endpointsSchema = z.object({
  start: identifierSchema,
  end: identifierSchema,
})

/**
 * Folds zod issues into a single SchemaMismatchError.
 */
function toMismatch(kind: ElementKind, error: z.ZodError): SchemaMismatchError {
  const unexpected: string[] = []
  const missing: string[] = []
  const other: string[] = []

  for (const issue of error.issues) {
    const field = issue.path[0]
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      unexpected.push(...issue.keys)
    } else if (issue.code === z.ZodIssueCode.custom && typeof field === 'string') {
      missing.push(field)
    } else {
      other.push(issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    }
  }

  return new SchemaMismatchError(kind, unexpected, missing, other.length > 0 ? other.join('; ') : undefined)
}

// =============================================================================
// VALIDATOR
// =============================================================================

/**
 * Builds node and edge records for one graph layout.
 */
export class RecordValidator<N extends string, E extends string> {
  private readonly nodeShape: FieldSetSchema<N>
  private readonly edgeShape: FieldSetSchema<E | RequiredEdgeAttribute>
  private readonly nodeNames: ReadonlySet<string>
  private readonly edgeNames: ReadonlySet<string>

  constructor(readonly schema: GraphSchema<N, E>) {
    this.nodeShape = fieldSetSchema(schema.nodeFields)
    this.edgeShape = fieldSetSchema(schema.edgeFields)
    this.nodeNames = new Set<string>(schema.nodeFields)
    this.edgeNames = new Set<string>(schema.edgeFields)
  }

  /**
   * Validate a complete node value.
   * @throws SchemaMismatchError if fields are missing or unexpected
   */
  node(input: unknown): NodeRecord<N> {
    const result = this.nodeShape.safeParse(input)
    if (!result.success) {
      throw toMismatch('node', result.error)
    }
    return Object.freeze(result.data)
  }

  /**
   * Validate a complete edge value, endpoints included.
   * @throws SchemaMismatchError if fields are missing, unexpected, or the endpoints are not identifiers
   */
  edge(input: unknown): EdgeRecord<E> {
    const result = this.edgeShape.safeParse(input)
    if (!result.success) {
      throw toMismatch('edge', result.error)
    }

    const endpoints = endpointsSchema.safeParse(result.data)
    if (!endpoints.success) {
      throw toMismatch('edge', endpoints.error)
    }

    return Object.freeze({ ...result.data, ...endpoints.data })
  }

  /**
   * Validate declared edge attributes and attach the endpoints.
   * Passing `start` or `end` among the attributes is rejected.
   */
  buildEdge(start: Identifier, end: Identifier, attributes: object): EdgeRecord<E> {
    const duplicated = REQUIRED_EDGE_ATTRIBUTES.filter((field) => Object.hasOwn(attributes, field))
    if (duplicated.length > 0) {
      throw new SchemaMismatchError('edge', duplicated, [], 'endpoints are passed positionally')
    }
    return this.edge({ ...attributes, start, end })
  }

  /**
   * Reject any name outside the layout of `kind`.
   * @throws SchemaMismatchError listing the unknown names
   */
  checkNames(kind: ElementKind, names: Iterable<string>): void {
    const known = kind === 'node' ? this.nodeNames : this.edgeNames
    const unexpected = [...names].filter((name) => !known.has(name))
    if (unexpected.length > 0) {
      throw new SchemaMismatchError(kind, unexpected)
    }
  }
}
