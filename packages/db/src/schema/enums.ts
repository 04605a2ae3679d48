import { pgEnum } from 'drizzle-orm/pg-core'
import {
  LifecycleStateMachine,
  ProvisioningStateMachine,
  ReservationStateMachine,
  directionalityValues,
  type StateMachine,
} from '@lightpath/schema'

/**
 * Enum registry for the NSI store.
 *
 * The three state enums are built from the state machines' own state tuples,
 * so the legal value set of each state column is whatever the machine declares
 * at schema-definition time. A machine gaining or losing a state changes the
 * rendered DDL: treat that as a migration.
 */

/** Point-to-point service directionality. */
export const directionalityEnum = pgEnum('directionality', directionalityValues)

/** `reservations.reservation_state` (reservation lifecycle axis). */
export const reservationStateEnum = pgEnum('reservation_state', ReservationStateMachine.states)

/** `reservations.provisioning_state` (nullable: provisioning not started). */
export const provisioningStateEnum = pgEnum('provisioning_state', ProvisioningStateMachine.states)

/** `reservations.lifecycle_state` (overall lifecycle axis). */
export const lifecycleStateEnum = pgEnum('lifecycle_state', LifecycleStateMachine.states)

/** Every enum type, in the order the DDL creates them. */
export const enumTypes: ReadonlyArray<{ readonly enumName: string; readonly enumValues: readonly string[] }> = [
  directionalityEnum,
  reservationStateEnum,
  provisioningStateEnum,
  lifecycleStateEnum,
]

export type EnumDrift = {
  /** States the machine declares that the column does not accept. */
  missing: string[]
  /** Values the column accepts that the machine no longer declares. */
  stale: string[]
}

/**
 * Compare a column's enum values with a state machine's live state set.
 *
 * Use the live registry of a deployed database (`pg_enum`) as `columnValues`
 * to detect a schema that was not migrated after a machine changed.
 */
export function stateEnumDrift<TState extends string, TEvent extends string>(
  columnValues: readonly string[],
  machine: StateMachine<TState, TEvent>,
): EnumDrift {
  const declared = new Set<string>(machine.states)
  const accepted = new Set(columnValues)
  return {
    missing: machine.states.filter((state) => !accepted.has(state)),
    stale: columnValues.filter((value) => !declared.has(value)),
  }
}
