/**
 * Custom Error Classes
 */

import type { ElementKind, Identifier } from '../schema/types'

/**
 * Base error for everything the graph raises.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'GraphError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Schema mismatch error.
 * Thrown when an attribute set does not match the declared layout exactly.
 */
export class SchemaMismatchError extends GraphError {
  constructor(
    public readonly kind: ElementKind,
    public readonly unexpected: readonly string[] = [],
    public readonly missing: readonly string[] = [],
    detail?: string,
  ) {
    const parts: string[] = []
    if (unexpected.length > 0) parts.push(`unexpected field names: ${unexpected.join(', ')}`)
    if (missing.length > 0) parts.push(`missing field names: ${missing.join(', ')}`)
    if (detail) parts.push(detail)
    super(`Invalid ${kind} attributes: ${parts.join('; ') || 'schema mismatch'}`)
    this.name = 'SchemaMismatchError'
  }
}

/**
 * Unknown identifier error.
 * Thrown when a lookup, replacement or removal names an identifier that is not live.
 */
export class UnknownIdentifierError extends GraphError {
  constructor(
    public readonly id: Identifier,
    public readonly kind: ElementKind,
  ) {
    super(`Unknown ${kind} identifier: ${id}`)
    this.name = 'UnknownIdentifierError'
  }
}

/**
 * Traversal error.
 * Thrown when a frontier selector breaks its contract.
 */
export class TraversalError extends GraphError {
  constructor(
    message: string,
    public readonly root: Identifier,
  ) {
    super(message)
    this.name = 'TraversalError'
  }
}

/**
 * Configuration error.
 * Thrown when graph options fail validation.
 */
export class ConfigurationError extends GraphError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'ConfigurationError'
  }
}
