import { customType, integer } from 'drizzle-orm/pg-core'
import type { Uuid } from '@lightpath/schema'
import { decodeUtcTimestamp, decodeUuid, encodeUtcTimestamp, encodeUuid, newUuid } from '../codecs'
import { InvalidValueError } from '../errors'

/**
 * UUID column.
 *
 * Stored as canonical hyphenated text in a native `uuid` column; every bind
 * and read passes through the UUID codec.
 */
export const uuid = customType<{ data: Uuid; driverData: string }>({
  dataType() {
    return 'uuid'
  },
  toDriver(value) {
    const encoded = encodeUuid(value)
    if (encoded === null) throw new InvalidValueError('UUID value is required.')
    return encoded
  },
  fromDriver(value) {
    const decoded = decodeUuid(value)
    if (decoded === null) throw new InvalidValueError('Stored UUID is missing.')
    return decoded
  },
})

/**
 * Timezone-aware timestamp column, always read back in UTC.
 *
 * Sub-second precision is dropped on write. Drivers hand back either text or
 * an already-parsed Date; both decode to a UTC instant.
 */
export const utcTimestamp = customType<{ data: Date; driverData: string | Date }>({
  dataType() {
    return 'timestamp with time zone'
  },
  toDriver(value) {
    const encoded = encodeUtcTimestamp(value)
    if (encoded === null) throw new InvalidValueError('Timestamp value is required.')
    return encoded
  },
  fromDriver(value) {
    const decoded = decodeUtcTimestamp(value)
    if (decoded === null) throw new InvalidValueError('Stored timestamp is missing.')
    return decoded
  },
})

/** Generated UUID primary key. */
export const uuidPrimaryKey = (name: string) => uuid(name).primaryKey().$defaultFn(newUuid)

/** Bandwidth in Mbps. */
export const mbps = (name: string) => integer(name)
