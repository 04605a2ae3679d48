import { sql } from 'drizzle-orm'
import { boolean, check, pgTable, text, uniqueIndex } from 'drizzle-orm/pg-core'
import { mbps, uuid } from './_common'

/**
 * ports
 *
 * Network termination points known to this provider, as deployed in the
 * orchestrator. Independent of any reservation.
 *
 * Ports are never deleted: connections keep referencing them for as long as
 * they exist. `enabled = false` is the only form of removal and only stops
 * the port from being selected for new reservations.
 */
export const ports = pgTable(
  'ports',
  {
    /** Subscription id of the port in the orchestrator. */
    portId: uuid('port_id').primaryKey(),
    name: text('name').notNull(),
    /** VLAN ranges available on this port, e.g. `"2-4094"`. */
    vlans: text('vlans').notNull(),
    /** STP at the other end of the link; informational only. */
    remoteStp: text('remote_stp'),
    bandwidth: mbps('bandwidth').notNull(),
    enabled: boolean('enabled').default(true).notNull(),
  },
  (table) => ({
    portsNameUnique: uniqueIndex('ports_name_unique').on(table.name),
    portsBandwidthNonNegativeCheck: check(
      'ports_bandwidth_non_negative_check',
      sql`"bandwidth" >= 0`,
    ),
  }),
)

export type Port = typeof ports.$inferSelect
export type NewPort = typeof ports.$inferInsert
