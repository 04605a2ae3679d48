import { sql } from 'drizzle-orm'
import { check, index, integer, pgTable, uniqueIndex } from 'drizzle-orm/pg-core'
import { mbps, uuid } from './_common'
import { ports } from './ports'
import { reservations } from './reservations'

/**
 * connections
 *
 * The provisioned form of a reservation: the two ports it runs between, the
 * VLAN selected on each, and the lightpath deployed for it in the
 * orchestrator.
 *
 * Note the singular `source_vlan`/`dest_vlan` against the plural
 * `src_vlans`/`dst_vlans` of reservations: by the time a connection exists
 * one VLAN per port has been selected.
 */
export const connections = pgTable(
  'connections',
  {
    connectionId: uuid('connection_id')
      .primaryKey()
      .references(() => reservations.connectionId, { onDelete: 'cascade' }),
    bandwidth: mbps('bandwidth').notNull(),
    /** Ports are referenced, not owned: no cascade in either direction. */
    sourcePortId: uuid('source_port_id')
      .notNull()
      .references(() => ports.portId),
    sourceVlan: integer('source_vlan').notNull(),
    destPortId: uuid('dest_port_id')
      .notNull()
      .references(() => ports.portId),
    destVlan: integer('dest_vlan').notNull(),
    /** Subscription id of the lightpath in the orchestrator. */
    subscriptionId: uuid('subscription_id').notNull(),
  },
  (table) => ({
    connectionsSubscriptionIdUnique: uniqueIndex('connections_subscription_id_unique').on(
      table.subscriptionId,
    ),
    connectionsSourcePortIdx: index('connections_source_port_idx').on(table.sourcePortId),
    connectionsDestPortIdx: index('connections_dest_port_idx').on(table.destPortId),
    connectionsBandwidthNonNegativeCheck: check(
      'connections_bandwidth_non_negative_check',
      sql`"bandwidth" >= 0`,
    ),
  }),
)

export type Connection = typeof connections.$inferSelect
export type NewConnection = typeof connections.$inferInsert
