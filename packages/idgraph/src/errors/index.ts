/**
 * Errors Module
 */

export {
  GraphError,
  SchemaMismatchError,
  UnknownIdentifierError,
  TraversalError,
  ConfigurationError,
} from './errors'
