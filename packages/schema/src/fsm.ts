/**
 * NSI connection state machines.
 *
 * The three machines below are the single source of the state names that the
 * `reservations` table accepts in its state columns. The database package
 * builds its pg enums from `machine.states`, so adding a state here is a
 * migration-required event (run the DDL/migration after changing a tuple).
 *
 * Events follow the NSI Connection Service v2 naming. Transition legality is
 * owned by these machines, never by the storage layer.
 */

export type StateMachineDefinition<
  TState extends string,
  TEvent extends string,
> = {
  /** Name used in error messages and enum drift reports. */
  name: string
  /** Every legal state, in declaration order. */
  states: readonly [TState, ...TState[]]
  initial: TState
  /** Event -> allowed source states and the single target state. */
  events: Record<TEvent, { from: readonly TState[]; to: TState }>
}

export type StateMachine<TState extends string, TEvent extends string> = {
  readonly name: string
  readonly states: readonly [TState, ...TState[]]
  readonly initial: TState
  isValidState(value: string): value is TState
  can(state: TState, event: TEvent): boolean
  transition(state: TState, event: TEvent): TState
  /** Events that may fire from `state`. */
  events(state: TState): TEvent[]
  isTerminal(state: TState): boolean
}

export class StateTransitionError extends Error {
  constructor(
    readonly machine: string,
    readonly state: string,
    readonly event: string,
  ) {
    super(`${machine}: event "${event}" is not allowed in state "${state}"`)
    this.name = 'StateTransitionError'
  }
}

export function defineStateMachine<TState extends string, TEvent extends string>(
  definition: StateMachineDefinition<TState, TEvent>,
): StateMachine<TState, TEvent> {
  const validStates = new Set<string>(definition.states)
  const eventNames = Object.keys(definition.events).filter(
    (name): name is TEvent => name in definition.events,
  )

  const can = (state: TState, event: TEvent): boolean =>
    definition.events[event].from.includes(state)

  const events = (state: TState): TEvent[] => eventNames.filter((event) => can(state, event))

  return {
    name: definition.name,
    states: definition.states,
    initial: definition.initial,
    isValidState(value: string): value is TState {
      return validStates.has(value)
    },
    can,
    transition(state, event) {
      if (!can(state, event)) {
        throw new StateTransitionError(definition.name, state, event)
      }
      return definition.events[event].to
    },
    events,
    isTerminal(state) {
      return events(state).length === 0
    },
  }
}

export const reservationStates = [
  'ReserveStart',
  'ReserveChecking',
  'ReserveHeld',
  'ReserveCommitting',
  'ReserveFailed',
  'ReserveTimeout',
  'ReserveAborting',
] as const

export type ReservationState = (typeof reservationStates)[number]

export type ReservationEvent =
  | 'reserve_request'
  | 'reserve_confirmed'
  | 'reserve_failed'
  | 'reserve_commit_request'
  | 'reserve_commit_confirmed'
  | 'reserve_commit_failed'
  | 'reserve_abort_request'
  | 'reserve_abort_confirmed'
  | 'reserve_timeout_notification'

export const ReservationStateMachine = defineStateMachine<ReservationState, ReservationEvent>({
  name: 'ReservationStateMachine',
  states: reservationStates,
  initial: 'ReserveStart',
  events: {
    reserve_request: { from: ['ReserveStart'], to: 'ReserveChecking' },
    reserve_confirmed: { from: ['ReserveChecking'], to: 'ReserveHeld' },
    reserve_failed: { from: ['ReserveChecking'], to: 'ReserveFailed' },
    reserve_commit_request: { from: ['ReserveHeld', 'ReserveTimeout'], to: 'ReserveCommitting' },
    reserve_commit_confirmed: { from: ['ReserveCommitting'], to: 'ReserveStart' },
    reserve_commit_failed: { from: ['ReserveCommitting'], to: 'ReserveStart' },
    reserve_abort_request: {
      from: ['ReserveHeld', 'ReserveFailed', 'ReserveTimeout'],
      to: 'ReserveAborting',
    },
    reserve_abort_confirmed: { from: ['ReserveAborting'], to: 'ReserveStart' },
    reserve_timeout_notification: { from: ['ReserveHeld'], to: 'ReserveTimeout' },
  },
})

export const provisioningStates = [
  'Released',
  'Provisioning',
  'Provisioned',
  'Releasing',
] as const

export type ProvisioningState = (typeof provisioningStates)[number]

export type ProvisioningEvent =
  | 'provision_request'
  | 'provision_confirmed'
  | 'release_request'
  | 'release_confirmed'

export const ProvisioningStateMachine = defineStateMachine<ProvisioningState, ProvisioningEvent>({
  name: 'ProvisioningStateMachine',
  states: provisioningStates,
  initial: 'Released',
  events: {
    provision_request: { from: ['Released'], to: 'Provisioning' },
    provision_confirmed: { from: ['Provisioning'], to: 'Provisioned' },
    release_request: { from: ['Provisioned'], to: 'Releasing' },
    release_confirmed: { from: ['Releasing'], to: 'Released' },
  },
})

export const lifecycleStates = [
  'Created',
  'Failed',
  'PassedEndTime',
  'Terminating',
  'Terminated',
] as const

export type LifecycleState = (typeof lifecycleStates)[number]

export type LifecycleEvent =
  | 'forced_end_notification'
  | 'endtime_event'
  | 'terminate_request'
  | 'terminate_confirmed'

export const LifecycleStateMachine = defineStateMachine<LifecycleState, LifecycleEvent>({
  name: 'LifecycleStateMachine',
  states: lifecycleStates,
  initial: 'Created',
  events: {
    forced_end_notification: { from: ['Created'], to: 'Failed' },
    endtime_event: { from: ['Created'], to: 'PassedEndTime' },
    terminate_request: { from: ['Created', 'Failed', 'PassedEndTime'], to: 'Terminating' },
    terminate_confirmed: { from: ['Terminating'], to: 'Terminated' },
  },
})
