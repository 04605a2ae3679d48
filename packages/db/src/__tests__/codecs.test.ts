import { describe, it, expect } from 'vitest'
import {
  NO_END_DATE,
  decodeUtcTimestamp,
  decodeUuid,
  encodeUtcTimestamp,
  encodeUuid,
  newUuid,
  normalizeTimestamp,
} from '../codecs'
import { InvalidValueError, NaiveTimestampError } from '../errors'

describe('codecs.ts', () => {
  describe('UUID', () => {
    it('should encode to canonical lower-case text', () => {
      expect(encodeUuid('123E4567-E89B-12D3-A456-426614174000')).toBe('123e4567-e89b-12d3-a456-426614174000')
    })

    it('should pass null through', () => {
      expect(encodeUuid(null)).toBeNull()
      expect(encodeUuid(undefined)).toBeNull()
      expect(decodeUuid(null)).toBeNull()
    })

    it('should refuse values that are not UUIDs', () => {
      expect(() => encodeUuid('not-a-uuid')).toThrow(InvalidValueError)
      expect(() => encodeUuid('not-a-uuid')).toThrow("'not-a-uuid' is not a valid UUID.")
      expect(() => encodeUuid(42)).toThrow("'42' is not a valid UUID.")
    })

    it('should decode stored text', () => {
      expect(decodeUuid('123e4567-e89b-12d3-a456-426614174000')).toBe('123e4567-e89b-12d3-a456-426614174000')
    })

    it('should refuse stored text that is not a UUID', () => {
      expect(() => decodeUuid('zzz')).toThrow(InvalidValueError)
      expect(() => decodeUuid('zzz')).toThrow("Stored value 'zzz' is not a valid UUID.")
    })

    it('should generate distinct UUIDs', () => {
      const first = newUuid()
      expect(encodeUuid(first)).toBe(first)
      expect(newUuid()).not.toBe(first)
    })
  })

  describe('encodeUtcTimestamp', () => {
    it('should convert offsets to UTC and drop sub-seconds', () => {
      expect(encodeUtcTimestamp('2024-03-01T12:30:45.678+02:00')).toBe('2024-03-01 10:30:45+00')
    })

    it('should handle negative offsets with minutes', () => {
      expect(encodeUtcTimestamp('2024-03-01T05:00:00-05:30')).toBe('2024-03-01 10:30:00+00')
    })

    it('should cross day boundaries', () => {
      expect(encodeUtcTimestamp('2024-01-01T01:00:00+02:00')).toBe('2023-12-31 23:00:00+00')
    })

    it('should encode Date instants', () => {
      expect(encodeUtcTimestamp(new Date(Date.UTC(2024, 0, 1, 0, 0, 0, 999)))).toBe('2024-01-01 00:00:00+00')
    })

    it('should refuse naive text', () => {
      expect(() => encodeUtcTimestamp('2024-03-01T12:30:45')).toThrow(NaiveTimestampError)
      expect(() => encodeUtcTimestamp('2024-03-01T12:30:45')).toThrow(
        'Expected timestamp with timezone. Got naive timestamp "2024-03-01T12:30:45" instead',
      )
    })

    it('should refuse dates that do not exist', () => {
      expect(() => encodeUtcTimestamp('2024-02-30T00:00:00Z')).toThrow(
        "'2024-02-30T00:00:00Z' is not an ISO-8601 timestamp.",
      )
    })

    it('should refuse an invalid Date', () => {
      expect(() => encodeUtcTimestamp(new Date('nope'))).toThrow(InvalidValueError)
    })

    it('should pass null through', () => {
      expect(encodeUtcTimestamp(null)).toBeNull()
    })
  })

  describe('decodeUtcTimestamp', () => {
    const expected = Date.UTC(2024, 2, 1, 10, 30, 45)

    it('should decode UTC text', () => {
      expect(decodeUtcTimestamp('2024-03-01 10:30:45+00')?.getTime()).toBe(expected)
    })

    it('should convert text with another offset', () => {
      expect(decodeUtcTimestamp('2024-03-01 12:30:45+02')?.getTime()).toBe(expected)
    })

    it('should label text without an offset as UTC', () => {
      expect(decodeUtcTimestamp('2024-03-01 10:30:45')?.getTime()).toBe(expected)
    })

    it('should copy Date values', () => {
      const stored = new Date(expected)
      const decoded = decodeUtcTimestamp(stored)
      expect(decoded?.getTime()).toBe(expected)
      expect(decoded).not.toBe(stored)
    })

    it('should refuse garbage', () => {
      expect(() => decodeUtcTimestamp('yesterday')).toThrow("Stored value 'yesterday' is not a timestamp.")
    })
  })

  describe('normalizeTimestamp', () => {
    it('should equal what storage hands back', () => {
      const value = new Date(Date.UTC(2024, 0, 1, 0, 0, 0, 500))
      expect(normalizeTimestamp(value).getTime()).toBe(Date.UTC(2024, 0, 1))
    })
  })

  it('should place NO_END_DATE at the start of 2108', () => {
    expect(NO_END_DATE.toISOString()).toBe('2108-01-01T00:00:00.000Z')
  })
})
