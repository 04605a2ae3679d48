import { sql } from 'drizzle-orm'
import {
  boolean,
  check,
  index,
  integer,
  pgTable,
  primaryKey,
  text,
  uniqueIndex,
} from 'drizzle-orm/pg-core'
import { NO_END_DATE } from '../codecs'
import { mbps, utcTimestamp, uuid, uuidPrimaryKey } from './_common'
import {
  directionalityEnum,
  lifecycleStateEnum,
  provisioningStateEnum,
  reservationStateEnum,
} from './enums'

/**
 * reservations
 *
 * One row per NSI reservation this provider has accepted a request for.
 *
 * Most attributes come from different parts of the `ReserveRequest` message
 * (header, criteria, schedule, point-to-point service). It is not a direct
 * mapping of the message.
 *
 * Key choice:
 * - `connection_id` is ours and always a UUID.
 * - connection ids of other NSAs are kept as text elsewhere; they are only
 *   required to be unique within the issuing NSA.
 *
 * The three state columns are written by the state machine driven request
 * handler only. This table guarantees membership of the legal value set, not
 * transition legality.
 */
export const reservations = pgTable(
  'reservations',
  {
    connectionId: uuidPrimaryKey('connection_id'),

    // header
    protocolVersion: text('protocol_version').notNull(),
    /** `urn:uid` of the request that created this reservation. */
    correlationId: uuid('correlation_id').notNull(),
    requesterNsa: text('requester_nsa').notNull(),
    providerNsa: text('provider_nsa').notNull(),
    replyTo: text('reply_to'),
    sessionSecurityAttributes: text('session_security_attributes'),

    // request message
    globalReservationId: text('global_reservation_id').notNull(),
    description: text('description'),

    // reservation request criteria
    version: integer('version').notNull(),

    // schedule
    startTime: utcTimestamp('start_time')
      .notNull()
      .$defaultFn(() => new Date()),
    endTime: utcTimestamp('end_time')
      .notNull()
      .$defaultFn(() => NO_END_DATE),

    // p2p
    bandwidth: mbps('bandwidth').notNull(),
    directionality: directionalityEnum('directionality').default('BI_DIRECTIONAL').notNull(),
    symmetric: boolean('symmetric').notNull(),

    srcDomain: text('src_domain').notNull(),
    srcNetworkType: text('src_network_type').notNull(),
    /** Name of the port, matches `ports.name`. */
    srcPort: text('src_port').notNull(),
    /**
     * Requested VLANs. A range (`"1-10"`) when the request used an
     * unqualified STP; the reservation process then selects one of them.
     */
    srcVlans: text('src_vlans').notNull(),
    /** The one VLAN selected out of `src_vlans`. */
    srcSelectedVlan: integer('src_selected_vlan'),

    dstDomain: text('dst_domain').notNull(),
    dstNetworkType: text('dst_network_type').notNull(),
    dstPort: text('dst_port').notNull(),
    dstVlans: text('dst_vlans').notNull(),
    dstSelectedVlan: integer('dst_selected_vlan'),

    // internal state keeping
    reservationState: reservationStateEnum('reservation_state').default('ReserveStart').notNull(),
    /** Null until provisioning starts. */
    provisioningState: provisioningStateEnum('provisioning_state'),
    lifecycleState: lifecycleStateEnum('lifecycle_state').default('Created').notNull(),
  },
  (table) => ({
    reservationsCorrelationIdUnique: uniqueIndex('reservations_correlation_id_unique').on(
      table.correlationId,
    ),
    reservationsStartTimeIdx: index('reservations_start_time_idx').on(table.startTime),
    reservationsEndTimeIdx: index('reservations_end_time_idx').on(table.endTime),
    reservationsScheduleCheck: check(
      'reservations_schedule_check',
      sql`"start_time" < "end_time"`,
    ),
    reservationsBandwidthNonNegativeCheck: check(
      'reservations_bandwidth_non_negative_check',
      sql`"bandwidth" >= 0`,
    ),
  }),
)

/**
 * parameters
 *
 * Open key/value bag of point-to-point service parameters per reservation.
 */
export const parameters = pgTable(
  'parameters',
  {
    connectionId: uuid('connection_id')
      .notNull()
      .references(() => reservations.connectionId, { onDelete: 'cascade' }),
    key: text('key').notNull(),
    value: text('value'),
  },
  (table) => ({
    /** Leading `connection_id` also indexes the foreign key. */
    parametersPk: primaryKey({
      name: 'parameters_pk',
      columns: [table.connectionId, table.key],
    }),
  }),
)

export type Reservation = typeof reservations.$inferSelect
export type NewReservation = typeof reservations.$inferInsert
export type Parameter = typeof parameters.$inferSelect
export type NewParameter = typeof parameters.$inferInsert
