import { getTableColumns } from 'drizzle-orm'
import type { PgTable } from 'drizzle-orm/pg-core'
import { connections } from './schema/connections'
import { pathTraces, paths, segments, stps } from './schema/path_traces'
import { ports } from './schema/ports'
import { parameters, reservations } from './schema/reservations'

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString()
  if (value === null || value === undefined) return 'null'
  return String(value)
}

/**
 * Build a `Entity(column=value, ...)` formatter for one table.
 *
 * The attribute list is taken once from the table's declared columns, in
 * declaration order, and labelled with the stored column names.
 */
export function entityFormatter<TTable extends PgTable>(
  entityName: string,
  table: TTable,
): (row: TTable['$inferSelect']) => string {
  const columns: Record<string, { name: string }> = getTableColumns(table)
  const attributes = Object.entries(columns).map(([key, column]) => ({
    key,
    label: column.name,
  }))
  return (row) => {
    const values = new Map<string, unknown>(Object.entries(row))
    const rendered = attributes.map(({ key, label }) => `${label}=${formatValue(values.get(key))}`)
    return `${entityName}(${rendered.join(', ')})`
  }
}

export const formatReservation = entityFormatter('Reservation', reservations)
export const formatPathTrace = entityFormatter('PathTrace', pathTraces)
export const formatPath = entityFormatter('Path', paths)
export const formatSegment = entityFormatter('Segment', segments)
export const formatStp = entityFormatter('Stp', stps)
export const formatParameter = entityFormatter('Parameter', parameters)
export const formatPort = entityFormatter('Port', ports)
export const formatConnection = entityFormatter('Connection', connections)
