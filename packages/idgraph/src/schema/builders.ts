/**
 * Schema Builder
 *
 * Turns the caller's attribute-name lists into the fixed layout a graph keeps
 * for its whole lifetime.
 */

import { z } from 'zod'
import { SchemaMismatchError } from '../errors'
import { REQUIRED_EDGE_ATTRIBUTES, type ElementKind, type GraphSchema } from './types'

const attributeNamesSchema = z.array(
  z
    .string()
    .min(1, 'attribute names must be non-empty')
    .refine((name) => name !== '__proto__', "'__proto__' cannot be an attribute name"),
)

function checkDeclaration(kind: ElementKind, names: readonly string[], reserved: readonly string[]): void {
  const result = attributeNamesSchema.safeParse(names)
  if (!result.success) {
    throw new SchemaMismatchError(kind, [], [], result.error.issues[0]?.message)
  }

  const seen = new Set<string>(reserved)
  const rejected: string[] = []
  for (const name of names) {
    if (seen.has(name)) rejected.push(name)
    seen.add(name)
  }

  if (rejected.length > 0) {
    throw new SchemaMismatchError(kind, rejected, [], 'attribute names must be declared once')
  }
}

/**
 * Creates a graph layout.
 *
 * Edges always carry `start` and `end` ahead of the declared edge attributes;
 * declaring either of them again is rejected, as is any duplicate or empty name.
 *
 * @example
 * ```typescript
 * const schema = defineSchema(['name'], ['weight'])
 * schema.edgeFields // ['start', 'end', 'weight']
 * ```
 *
 * @throws SchemaMismatchError when a declaration is invalid
 */
export function defineSchema<N extends string, E extends string>(
  nodeAttributes: readonly N[],
  edgeAttributes: readonly E[],
): GraphSchema<N, E> {
  checkDeclaration('node', nodeAttributes, [])
  checkDeclaration('edge', edgeAttributes, REQUIRED_EDGE_ATTRIBUTES)

  const nodes = Object.freeze([...nodeAttributes])
  const edges = Object.freeze([...edgeAttributes])

  return Object.freeze({
    nodeAttributes: nodes,
    edgeAttributes: edges,
    nodeFields: nodes,
    edgeFields: Object.freeze([...REQUIRED_EDGE_ATTRIBUTES, ...edges]),
  })
}
