import { relations } from 'drizzle-orm'
import { connections } from './connections'
import { pathTraces, paths, segments, stps } from './path_traces'
import { ports } from './ports'
import { parameters, reservations } from './reservations'

/**
 * Object graph for the relational query API (`db.query.*`).
 *
 * Ownership (and the cascades that go with it) is declared on the foreign
 * keys themselves; these relations only describe how to traverse.
 */

export const reservationsRelations = relations(reservations, ({ one, many }) => ({
  pathTrace: one(pathTraces),
  parameters: many(parameters),
  connection: one(connections),
}))

export const parametersRelations = relations(parameters, ({ one }) => ({
  reservation: one(reservations, {
    fields: [parameters.connectionId],
    references: [reservations.connectionId],
  }),
}))

export const pathTracesRelations = relations(pathTraces, ({ one, many }) => ({
  reservation: one(reservations, {
    fields: [pathTraces.connectionId],
    references: [reservations.connectionId],
  }),
  paths: many(paths),
}))

export const pathsRelations = relations(paths, ({ one, many }) => ({
  pathTrace: one(pathTraces, {
    fields: [paths.pathTraceId, paths.agConnectionId],
    references: [pathTraces.pathTraceId, pathTraces.agConnectionId],
  }),
  segments: many(segments),
}))

export const segmentsRelations = relations(segments, ({ one, many }) => ({
  path: one(paths, {
    fields: [segments.pathId],
    references: [paths.pathId],
  }),
  stps: many(stps),
}))

export const stpsRelations = relations(stps, ({ one }) => ({
  segment: one(segments, {
    fields: [stps.segmentId, stps.pathId],
    references: [segments.segmentId, segments.pathId],
  }),
}))

export const connectionsRelations = relations(connections, ({ one }) => ({
  reservation: one(reservations, {
    fields: [connections.connectionId],
    references: [reservations.connectionId],
  }),
  sourcePort: one(ports, {
    fields: [connections.sourcePortId],
    references: [ports.portId],
    relationName: 'connection_source_port',
  }),
  destPort: one(ports, {
    fields: [connections.destPortId],
    references: [ports.portId],
    relationName: 'connection_dest_port',
  }),
}))

export const portsRelations = relations(ports, ({ many }) => ({
  sourceOf: many(connections, { relationName: 'connection_source_port' }),
  destOf: many(connections, { relationName: 'connection_dest_port' }),
}))
