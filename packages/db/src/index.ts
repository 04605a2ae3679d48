// Schema (tables, enums, relations, column types)
export * from './schema'

// Codecs and errors
export * from './codecs'
export * from './errors'

// Database access
export { createDatabase, type Database } from './client'
export { loadDatabaseConfig, type DatabaseConfig } from './config'
export { renderSchemaDdl, renderTableDdl, schemaDdlStatements, tablesInDependencyOrder } from './ddl'
export * from './describe'
export { findSchemaFindings, type Finding } from './schema-guard'
export { log, logError } from './log'

// Operations
export * from './services/connections'
export * from './services/ordered-children'
export * from './services/path-traces'
export * from './services/ports'
export * from './services/reservations'
