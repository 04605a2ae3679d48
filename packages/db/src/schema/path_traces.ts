import { sql } from 'drizzle-orm'
import {
  check,
  foreignKey,
  index,
  integer,
  pgTable,
  primaryKey,
  text,
  unique,
  uniqueIndex,
} from 'drizzle-orm/pg-core'
import { uuid, uuidPrimaryKey } from './_common'
import { reservations } from './reservations'

/**
 * path_traces
 *
 * The multi-domain path a reservation traverses, as reported by the
 * aggregator that sent the request. One trace per reservation at most.
 *
 * The whole tree below a trace (paths -> segments -> stps) is one snapshot:
 * it is replaced by delete + insert, never patched row by row.
 */
export const pathTraces = pgTable(
  'path_traces',
  {
    /** NSA identifier of the root or head-end aggregator NSA. */
    pathTraceId: text('path_trace_id').notNull(),
    /** Connection id issued by that aggregator (not ours, not a UUID). */
    agConnectionId: text('ag_connection_id').notNull(),
    /** Our connection id. */
    connectionId: uuid('connection_id')
      .notNull()
      .references(() => reservations.connectionId, { onDelete: 'cascade' }),
  },
  (table) => ({
    pathTracesPk: primaryKey({
      name: 'path_traces_pk',
      columns: [table.pathTraceId, table.agConnectionId],
    }),
    /** One trace per reservation; also the index behind the foreign key. */
    pathTracesConnectionIdUnique: uniqueIndex('path_traces_connection_id_unique').on(
      table.connectionId,
    ),
  }),
)

/**
 * paths
 *
 * One alternative path within a trace.
 */
export const paths = pgTable(
  'paths',
  {
    pathId: uuidPrimaryKey('path_id'),
    pathTraceId: text('path_trace_id').notNull(),
    agConnectionId: text('ag_connection_id').notNull(),
  },
  (table) => ({
    pathsPathTraceFk: foreignKey({
      columns: [table.pathTraceId, table.agConnectionId],
      foreignColumns: [pathTraces.pathTraceId, pathTraces.agConnectionId],
      name: 'paths_path_trace_fk',
    }).onDelete('cascade'),
    /** Composite foreign keys get no automatic index. */
    fkToPathTracesIdx: index('fk_to_path_traces_idx').on(table.pathTraceId, table.agConnectionId),
  }),
)

/**
 * segments
 *
 * Per-domain hops of a path, in hop order. `order` is zero-based and
 * contiguous within a path; see `services/ordered-children.ts`.
 */
export const segments = pgTable(
  'segments',
  {
    /** NSA identifier of the uPA handling this segment. */
    segmentId: text('segment_id').notNull(),
    pathId: uuid('path_id')
      .notNull()
      .references(() => paths.pathId, { onDelete: 'cascade' }),
    /** Connection id issued by the uPA, not ours. */
    upaConnectionId: text('upa_connection_id').notNull(),
    order: integer('order').notNull(),
  },
  (table) => ({
    segmentsPk: primaryKey({
      name: 'segments_pk',
      columns: [table.segmentId, table.pathId],
    }),
    /**
     * Two siblings never share a position. Leading `path_id` makes this the
     * index for joins on the foreign key as well.
     */
    segmentsPathOrderUnique: unique('segments_path_id_order_unique').on(table.pathId, table.order),
    segmentsOrderNonNegativeCheck: check('segments_order_non_negative_check', sql`"order" >= 0`),
  }),
)

/**
 * stps
 *
 * Service termination points of a segment, in hop order.
 */
export const stps = pgTable(
  'stps',
  {
    /** Fully qualified STP identifier. */
    stpId: text('stp_id').primaryKey(),
    segmentId: text('segment_id').notNull(),
    pathId: uuid('path_id').notNull(),
    order: integer('order').notNull(),
  },
  (table) => ({
    stpsSegmentFk: foreignKey({
      columns: [table.segmentId, table.pathId],
      foreignColumns: [segments.segmentId, segments.pathId],
      name: 'stps_segment_fk',
    }).onDelete('cascade'),
    fkToSegmentIdx: index('fk_to_segment_idx').on(table.segmentId, table.pathId),
    /**
     * Position is unique per parent. The parent key is the segment's full key
     * (segment_id, path_id): a segment id alone repeats across paths.
     */
    stpsSegmentOrderUnique: unique('stps_segment_order_unique').on(
      table.segmentId,
      table.pathId,
      table.order,
    ),
    stpsOrderNonNegativeCheck: check('stps_order_non_negative_check', sql`"order" >= 0`),
  }),
)

export type PathTrace = typeof pathTraces.$inferSelect
export type NewPathTrace = typeof pathTraces.$inferInsert
export type Path = typeof paths.$inferSelect
export type NewPath = typeof paths.$inferInsert
export type Segment = typeof segments.$inferSelect
export type NewSegment = typeof segments.$inferInsert
export type SegmentStp = typeof stps.$inferSelect
export type NewSegmentStp = typeof stps.$inferInsert
