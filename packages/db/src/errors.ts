/**
 * Errors raised by this package.
 *
 * Storage-engine constraint violations (unique, check, foreign key) are not
 * wrapped: they reach the caller exactly as the driver raised them. The
 * helpers at the bottom only inspect them.
 */

/** A value that cannot be encoded for, or decoded from, storage. */
export class InvalidValueError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidValueError'
  }
}

/** A timestamp without timezone information was about to be written. */
export class NaiveTimestampError extends Error {
  constructor(readonly value: string) {
    super(`Expected timestamp with timezone. Got naive timestamp "${value}" instead`)
    this.name = 'NaiveTimestampError'
  }
}

/** Raised by the caller-policy helper when a port cannot take new reservations. */
export class PortUnavailableError extends Error {
  constructor(
    readonly portName: string,
    reason: string,
  ) {
    super(`Port "${portName}" is unavailable: ${reason}`)
    this.name = 'PortUnavailableError'
  }
}

type DriverError = {
  code: string
  constraint: unknown
}

function driverError(error: unknown): DriverError | null {
  if (typeof error !== 'object' || error === null) return null
  if ('code' in error && typeof error.code === 'string') {
    return { code: error.code, constraint: 'constraint' in error ? error.constraint : undefined }
  }
  return 'cause' in error ? driverError(error.cause) : null
}

/** SQLSTATE of a driver error (or of its cause), if any. */
export function sqlState(error: unknown): string | null {
  return driverError(error)?.code ?? null
}

/** True for SQLSTATE class 23 (integrity constraint violation). */
export function isConstraintViolation(error: unknown): boolean {
  return sqlState(error)?.startsWith('23') ?? false
}

/** Name of the violated constraint when the driver reports it. */
export function constraintName(error: unknown): string | null {
  const found = driverError(error)
  return typeof found?.constraint === 'string' ? found.constraint : null
}
