/**
 * Graph Configuration
 */

import type { ConsolaInstance } from 'consola'
import { z } from 'zod'
import { ConfigurationError } from './errors'
import { createLogger } from './utils/logger'

export interface GraphConfig {
  /**
   * Remove every edge that starts or ends at a node when the node is removed
   * (default: false - such edges are left dangling)
   */
  cascadeRemovals?: boolean
  /** Logger for mutation tracing (default: the shared `graph` logger) */
  logger?: ConsolaInstance
}

export interface ResolvedGraphConfig {
  cascadeRemovals: boolean
  logger: ConsolaInstance
}

export const defaultGraphConfig: Required<Omit<GraphConfig, 'logger'>> = {
  cascadeRemovals: false,
}

const defaultLogger = createLogger('graph')

function isLogger(value: unknown): value is ConsolaInstance {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function' &&
    'warn' in value &&
    typeof value.warn === 'function'
  )
}

const graphConfigSchema = z
  .object({
    cascadeRemovals: z.boolean().default(defaultGraphConfig.cascadeRemovals),
    logger: z.custom<ConsolaInstance>(isLogger, { message: 'Expected a consola instance' }).optional(),
  })
  .strict()

/**
 * Validate user options and fill in defaults.
 * @throws ConfigurationError if an option is unknown or has the wrong type
 */
export function resolveGraphConfig(config: GraphConfig = {}): ResolvedGraphConfig {
  const result = graphConfigSchema.safeParse(config)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.') || undefined
    throw new ConfigurationError(
      `Invalid graph config${field ? ` at '${field}'` : ''}: ${issue?.message ?? 'validation failed'}`,
      field,
      result.error,
    )
  }

  return {
    cascadeRemovals: result.data.cascadeRemovals,
    logger: result.data.logger ?? defaultLogger,
  }
}
