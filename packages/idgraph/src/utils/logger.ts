import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Root instance; tagged children copy its options when created
export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

const children: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  children.push(child)
  return child
}

// Set global log level (root plus every createLogger child)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of children) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
