import { and, eq } from 'drizzle-orm'
import {
  LifecycleStateMachine,
  ProvisioningStateMachine,
  ReservationStateMachine,
  Stp,
  parameterInputSchema,
  reservationInputSchema,
  uuidSchema,
  vlanSchema,
  type LifecycleState,
  type ProvisioningState,
  type ReservationInput,
  type ReservationState,
  type Uuid,
} from '@lightpath/schema'
import type { Database } from '../client'
import { NO_END_DATE, newUuid, normalizeTimestamp } from '../codecs'
import { InvalidValueError } from '../errors'
import { parameters, reservations, type Reservation } from '../schema/reservations'

/**
 * Insert a reservation for a first `ReserveRequest`.
 *
 * The connection id is generated here. State columns start at the initial
 * states of their machines; provisioning has not started (null).
 * `start_time < end_time` and the unique correlation id are enforced by the
 * database.
 */
export async function createReservation(db: Database, input: ReservationInput): Promise<Reservation> {
  const parsed = reservationInputSchema.parse(input)
  const [created] = await db
    .insert(reservations)
    .values({
      connectionId: newUuid(),
      protocolVersion: parsed.protocolVersion,
      correlationId: parsed.correlationId,
      requesterNsa: parsed.requesterNsa,
      providerNsa: parsed.providerNsa,
      replyTo: parsed.replyTo ?? null,
      sessionSecurityAttributes: parsed.sessionSecurityAttributes ?? null,
      globalReservationId: parsed.globalReservationId,
      description: parsed.description ?? null,
      version: parsed.version,
      startTime: normalizeTimestamp(parsed.startTime ?? new Date()),
      endTime: normalizeTimestamp(parsed.endTime ?? NO_END_DATE),
      bandwidth: parsed.bandwidth,
      directionality: parsed.directionality,
      symmetric: parsed.symmetric,
      srcDomain: parsed.source.domain,
      srcNetworkType: parsed.source.networkType,
      srcPort: parsed.source.port,
      srcVlans: parsed.source.vlans,
      dstDomain: parsed.destination.domain,
      dstNetworkType: parsed.destination.networkType,
      dstPort: parsed.destination.port,
      dstVlans: parsed.destination.vlans,
      reservationState: ReservationStateMachine.initial,
      provisioningState: null,
      lifecycleState: LifecycleStateMachine.initial,
    })
    .returning()
  if (!created) {
    throw new Error('Reservation insert returned no row')
  }
  return created
}

export async function getReservation(db: Database, connectionId: Uuid): Promise<Reservation | null> {
  const [row] = await db
    .select()
    .from(reservations)
    .where(eq(reservations.connectionId, connectionId))
    .limit(1)
  return row ?? null
}

export async function getReservationByCorrelationId(
  db: Database,
  correlationId: Uuid,
): Promise<Reservation | null> {
  const [row] = await db
    .select()
    .from(reservations)
    .where(eq(reservations.correlationId, correlationId))
    .limit(1)
  return row ?? null
}

/**
 * Delete a reservation and, through ON DELETE CASCADE, its path trace tree,
 * parameters and connection in the same statement.
 */
export async function deleteReservation(db: Database, connectionId: Uuid): Promise<boolean> {
  const deleted = await db
    .delete(reservations)
    .where(eq(reservations.connectionId, connectionId))
    .returning({ connectionId: reservations.connectionId })
  return deleted.length > 0
}

export type ReservationStatePatch = {
  reservationState?: string
  /** null resets provisioning to "not started". */
  provisioningState?: string | null
  lifecycleState?: string
}

function legalState<TState extends string>(
  machine: { name: string; isValidState(value: string): value is TState },
  value: string,
): TState {
  if (!machine.isValidState(value)) {
    throw new InvalidValueError(`'${value}' is not a state of ${machine.name}.`)
  }
  return value
}

/**
 * Write state column values computed by the state machines.
 *
 * Each value must belong to its machine's state set; the enum column type
 * rejects it again in the database. Whether the transition itself is legal is
 * the caller's (state machine's) concern. Callers serialize concurrent writes
 * for one connection id.
 */
export async function updateReservationStates(
  db: Database,
  connectionId: Uuid,
  patch: ReservationStatePatch,
): Promise<Reservation | null> {
  const values: {
    reservationState?: ReservationState
    provisioningState?: ProvisioningState | null
    lifecycleState?: LifecycleState
  } = {}
  if (patch.reservationState !== undefined) {
    values.reservationState = legalState(ReservationStateMachine, patch.reservationState)
  }
  if (patch.provisioningState !== undefined) {
    values.provisioningState =
      patch.provisioningState === null ? null : legalState(ProvisioningStateMachine, patch.provisioningState)
  }
  if (patch.lifecycleState !== undefined) {
    values.lifecycleState = legalState(LifecycleStateMachine, patch.lifecycleState)
  }
  if (Object.keys(values).length === 0) {
    return getReservation(db, connectionId)
  }
  const [row] = await db
    .update(reservations)
    .set(values)
    .where(eq(reservations.connectionId, connectionId))
    .returning()
  return row ?? null
}

/** Record the VLAN chosen on each side out of the requested ranges. */
export async function selectVlans(
  db: Database,
  connectionId: Uuid,
  selected: { source: number; destination: number },
): Promise<Reservation | null> {
  const source = vlanSchema.parse(selected.source)
  const destination = vlanSchema.parse(selected.destination)
  const reservation = await getReservation(db, connectionId)
  if (!reservation) return null
  const src = sourceStp(reservation).vlanRanges
  const dst = destinationStp(reservation).vlanRanges
  if (src && !src.contains(source)) {
    throw new InvalidValueError(`VLAN ${source} is not within requested source VLANs ${reservation.srcVlans}.`)
  }
  if (dst && !dst.contains(destination)) {
    throw new InvalidValueError(
      `VLAN ${destination} is not within requested destination VLANs ${reservation.dstVlans}.`,
    )
  }
  const [row] = await db
    .update(reservations)
    .set({ srcSelectedVlan: source, dstSelectedVlan: destination })
    .where(eq(reservations.connectionId, connectionId))
    .returning()
  return row ?? null
}

type EndpointColumns = {
  domain: string
  networkType: string
  port: string
  vlans: string
  selectedVlan: number | null
}

function endpointStp(side: string, endpoint: EndpointColumns, selected: boolean): Stp {
  if (selected && endpoint.selectedVlan === null) {
    throw new InvalidValueError(`No ${side} VLAN has been selected yet.`)
  }
  const vlans = selected ? String(endpoint.selectedVlan) : endpoint.vlans
  return new Stp(endpoint.domain, endpoint.networkType, endpoint.port, `vlan=${vlans}`)
}

/**
 * Source endpoint as an STP.
 *
 * Early in the reservation process it carries the requested VLAN range;
 * with `selected` it carries the one selected VLAN instead.
 */
export function sourceStp(
  reservation: Reservation,
  options: { selected?: boolean } = {},
): Stp {
  return endpointStp(
    'source',
    {
      domain: reservation.srcDomain,
      networkType: reservation.srcNetworkType,
      port: reservation.srcPort,
      vlans: reservation.srcVlans,
      selectedVlan: reservation.srcSelectedVlan,
    },
    options.selected ?? false,
  )
}

/** Destination endpoint as an STP; see `sourceStp`. */
export function destinationStp(
  reservation: Reservation,
  options: { selected?: boolean } = {},
): Stp {
  return endpointStp(
    'destination',
    {
      domain: reservation.dstDomain,
      networkType: reservation.dstNetworkType,
      port: reservation.dstPort,
      vlans: reservation.dstVlans,
      selectedVlan: reservation.dstSelectedVlan,
    },
    options.selected ?? false,
  )
}

// -----------------------------------------------------------------------------
// Parameters
// -----------------------------------------------------------------------------

export async function setParameter(
  db: Database,
  connectionId: Uuid,
  key: string,
  value: string | null,
): Promise<void> {
  const parsed = parameterInputSchema.parse({ key, value })
  await db
    .insert(parameters)
    .values({ connectionId: uuidSchema.parse(connectionId), key: parsed.key, value: parsed.value })
    .onConflictDoUpdate({
      target: [parameters.connectionId, parameters.key],
      set: { value: parsed.value },
    })
}

export async function getParameters(
  db: Database,
  connectionId: Uuid,
): Promise<Record<string, string | null>> {
  const rows = await db
    .select({ key: parameters.key, value: parameters.value })
    .from(parameters)
    .where(eq(parameters.connectionId, connectionId))
    .orderBy(parameters.key)
  return Object.fromEntries(rows.map((row) => [row.key, row.value]))
}

export async function deleteParameter(db: Database, connectionId: Uuid, key: string): Promise<boolean> {
  const deleted = await db
    .delete(parameters)
    .where(and(eq(parameters.connectionId, connectionId), eq(parameters.key, key)))
    .returning({ key: parameters.key })
  return deleted.length > 0
}
