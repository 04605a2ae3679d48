import * as connectionsSchema from './connections'
import * as enumsSchema from './enums'
import * as pathTracesSchema from './path_traces'
import * as portsSchema from './ports'
import * as relationsSchema from './relations'
import * as reservationsSchema from './reservations'

export * from './_common'
export * from './enums'
export * from './reservations'
export * from './path_traces'
export * from './ports'
export * from './connections'
export * from './relations'

/**
 * Unified Drizzle schema registry (tables, enums and relations).
 *
 * Passed to `drizzle()` so `db.query.*` knows the object graph.
 */
export const schema = {
  ...enumsSchema,
  ...reservationsSchema,
  ...pathTracesSchema,
  ...portsSchema,
  ...connectionsSchema,
  ...relationsSchema,
}

export type Schema = typeof schema
