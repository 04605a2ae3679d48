import { describe, it, expect } from 'vitest'
import { constraintName, isConstraintViolation, sqlState } from '../errors'

describe('errors.ts', () => {
  it('should recognise integrity constraint violations', () => {
    const error = Object.assign(new Error('duplicate key'), { code: '23505', constraint: 'ports_name_unique' })
    expect(isConstraintViolation(error)).toBe(true)
    expect(constraintName(error)).toBe('ports_name_unique')
  })

  it('should look through wrapping errors', () => {
    const error = new Error('query failed', { cause: { code: '23503', constraint: 'stps_segment_fk' } })
    expect(sqlState(error)).toBe('23503')
    expect(constraintName(error)).toBe('stps_segment_fk')
  })

  it('should ignore other errors', () => {
    const syntax = Object.assign(new Error('syntax error'), { code: '42601' })
    expect(isConstraintViolation(syntax)).toBe(false)
    expect(isConstraintViolation(new Error('plain'))).toBe(false)
    expect(isConstraintViolation('23505')).toBe(false)
    expect(constraintName(new Error('plain'))).toBeNull()
  })
})
