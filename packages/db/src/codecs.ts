import { randomUUID } from 'node:crypto'
import { uuidSchema, type TimestampInput, type Uuid } from '@lightpath/schema'
import { InvalidValueError, NaiveTimestampError } from './errors'

// -----------------------------------------------------------------------------
// UUID
// -----------------------------------------------------------------------------

/**
 * Encode a UUID into its canonical 36-character hyphenated text.
 *
 * Anything that is not a UUID is refused instead of being stored as-is.
 */
export function encodeUuid(value: unknown): string | null {
  if (value === null || value === undefined) return null
  const parsed = uuidSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidValueError(`'${String(value)}' is not a valid UUID.`)
  }
  return parsed.data
}

export function decodeUuid(value: string | null): Uuid | null {
  if (value === null) return null
  const parsed = uuidSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidValueError(`Stored value '${value}' is not a valid UUID.`)
  }
  return parsed.data
}

export function newUuid(): Uuid {
  return uuidSchema.parse(randomUUID())
}

// -----------------------------------------------------------------------------
// UTC timestamps
// -----------------------------------------------------------------------------

/** End time used when a reservation does not specify one. */
export const NO_END_DATE = new Date(Date.UTC(2108, 0, 1))

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/

type TimestampParts = {
  /** Milliseconds since epoch of the wall-clock fields read as UTC. */
  wallClock: number
  /** Offset from UTC in minutes, null for naive text. */
  offsetMinutes: number | null
}

function parseTimestampText(text: string): TimestampParts | null {
  const match = ISO_TIMESTAMP.exec(text.trim())
  if (!match) return null
  const [, year, month, day, hour, minute, second = '0', fraction = '', zone] = match
  const wallClock = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    Number(fraction.slice(0, 3).padEnd(3, '0')),
  )
  // Date.UTC rolls 2024-02-30 over into March; treat that as unparseable
  const check = new Date(wallClock)
  if (
    Number.isNaN(wallClock) ||
    check.getUTCMonth() !== Number(month) - 1 ||
    check.getUTCDate() !== Number(day) ||
    check.getUTCHours() !== Number(hour) ||
    check.getUTCMinutes() !== Number(minute)
  ) {
    return null
  }
  return { wallClock, offsetMinutes: zone === undefined ? null : parseOffset(zone) }
}

function parseOffset(zone: string): number {
  if (zone === 'Z' || zone === 'z') return 0
  const sign = zone.startsWith('-') ? -1 : 1
  const digits = zone.slice(1).replace(':', '')
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2) || '0'))
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0')
}

function toInstant(value: TimestampInput): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidValueError('Invalid Date cannot be stored as a timestamp.')
    }
    return value
  }
  const parts = parseTimestampText(value)
  if (!parts) {
    throw new InvalidValueError(`'${value}' is not an ISO-8601 timestamp.`)
  }
  if (parts.offsetMinutes === null) {
    throw new NaiveTimestampError(value)
  }
  return new Date(parts.wallClock - parts.offsetMinutes * 60_000)
}

/**
 * Encode a timezone-aware timestamp for storage.
 *
 * The value is converted to UTC and truncated to whole seconds; the text is
 * `YYYY-MM-DD HH:MM:SS+00`. Naive text is refused with NaiveTimestampError.
 */
export function encodeUtcTimestamp(value: TimestampInput | null | undefined): string | null {
  if (value === null || value === undefined) return null
  const instant = toInstant(value)
  return (
    `${pad(instant.getUTCFullYear(), 4)}-${pad(instant.getUTCMonth() + 1)}-${pad(instant.getUTCDate())} ` +
    `${pad(instant.getUTCHours())}:${pad(instant.getUTCMinutes())}:${pad(instant.getUTCSeconds())}+00`
  )
}

/**
 * Decode a stored timestamp into a UTC instant.
 *
 * Stored text with an offset is converted to UTC. Stored text without one is
 * labelled UTC as-is: only UTC wall-clock values are ever written, so a backend
 * that drops the zone still yields the right instant.
 */
export function decodeUtcTimestamp(value: string | Date | null): Date | null {
  if (value === null) return null
  if (value instanceof Date) return new Date(value.getTime())
  const parts = parseTimestampText(value)
  if (!parts) {
    throw new InvalidValueError(`Stored value '${value}' is not a timestamp.`)
  }
  if (parts.offsetMinutes === null) return new Date(parts.wallClock)
  return new Date(parts.wallClock - parts.offsetMinutes * 60_000)
}

/** What a value reads back as after a round trip through storage. */
export function normalizeTimestamp(value: TimestampInput): Date {
  const decoded = decodeUtcTimestamp(encodeUtcTimestamp(value))
  if (decoded === null) {
    throw new InvalidValueError('Timestamp is required.')
  }
  return decoded
}
