import { SQL, is } from 'drizzle-orm'
import { PgDialect, getTableConfig, type PgColumn, type PgTable } from 'drizzle-orm/pg-core'
import { connections } from './schema/connections'
import { enumTypes } from './schema/enums'
import { pathTraces, paths, segments, stps } from './schema/path_traces'
import { ports } from './schema/ports'
import { parameters, reservations } from './schema/reservations'

/** Tables in creation order: every table after the tables it references. */
export const tablesInDependencyOrder: PgTable[] = [
  reservations,
  pathTraces,
  paths,
  segments,
  stps,
  parameters,
  ports,
  connections,
]

const dialect = new PgDialect()

function quote(identifier: string): string {
  return `"${identifier.replaceAll('"', '""')}"`
}

function columnList(columns: readonly { name: string }[]): string {
  return columns.map((column) => quote(column.name)).join(', ')
}

function literal(value: unknown): string {
  if (is(value, SQL)) return dialect.sqlToQuery(value).sql
  if (typeof value === 'string') return `'${value.replaceAll("'", "''")}'`
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  throw new Error(`Unsupported column default: ${String(value)}`)
}

function indexColumn(column: unknown): string {
  if (typeof column === 'object' && column !== null && 'name' in column && typeof column.name === 'string') {
    return quote(column.name)
  }
  throw new Error('Expression indexes are not supported by the DDL renderer')
}

function renderColumn(column: PgColumn): string {
  const parts = [quote(column.name), column.getSQLType()]
  if (column.primary) parts.push('PRIMARY KEY')
  if (column.notNull) parts.push('NOT NULL')
  // `$defaultFn` defaults live in the application and leave `default` unset
  if (column.default !== undefined) parts.push(`DEFAULT ${literal(column.default)}`)
  return parts.join(' ')
}

/**
 * `CREATE TABLE` plus `CREATE INDEX` statements for one table.
 *
 * Composite primary keys, composite foreign keys, unique constraints and
 * checks are table-level constraints, exactly as declared on the table.
 */
export function renderTableDdl(table: PgTable): string[] {
  const config = getTableConfig(table)
  const tableName = quote(config.name)

  const lines = config.columns.map(renderColumn)
  for (const primaryKey of config.primaryKeys) {
    lines.push(`CONSTRAINT ${quote(primaryKey.getName())} PRIMARY KEY (${columnList(primaryKey.columns)})`)
  }
  for (const foreignKey of config.foreignKeys) {
    const reference = foreignKey.reference()
    const foreignTable = getTableConfig(reference.foreignTable).name
    let line =
      `CONSTRAINT ${quote(foreignKey.getName())} FOREIGN KEY (${columnList(reference.columns)}) ` +
      `REFERENCES ${quote(foreignTable)} (${columnList(reference.foreignColumns)})`
    if (foreignKey.onDelete) line += ` ON DELETE ${foreignKey.onDelete.toUpperCase()}`
    if (foreignKey.onUpdate) line += ` ON UPDATE ${foreignKey.onUpdate.toUpperCase()}`
    lines.push(line)
  }
  for (const unique of config.uniqueConstraints) {
    const name = unique.getName() ?? `${config.name}_${unique.columns.map((column) => column.name).join('_')}_unique`
    lines.push(`CONSTRAINT ${quote(name)} UNIQUE (${columnList(unique.columns)})`)
  }
  for (const check of config.checks) {
    lines.push(`CONSTRAINT ${quote(check.name)} CHECK (${dialect.sqlToQuery(check.value).sql.trim()})`)
  }

  const statements = [`CREATE TABLE ${tableName} (\n  ${lines.join(',\n  ')}\n)`]
  for (const index of config.indexes) {
    const { name, unique, columns } = index.config
    if (!name) {
      throw new Error(`Index on ${config.name} needs an explicit name`)
    }
    statements.push(
      `CREATE ${unique ? 'UNIQUE ' : ''}INDEX ${quote(name)} ON ${tableName} (${columns.map(indexColumn).join(', ')})`,
    )
  }
  return statements
}

/** The whole schema as executable PostgreSQL DDL, one statement per entry. */
export function schemaDdlStatements(): string[] {
  const statements = enumTypes.map(
    (enumType) =>
      `CREATE TYPE ${quote(enumType.enumName)} AS ENUM (${enumType.enumValues.map(literal).join(', ')})`,
  )
  for (const table of tablesInDependencyOrder) {
    statements.push(...renderTableDdl(table))
  }
  return statements
}

export function renderSchemaDdl(): string {
  return schemaDdlStatements()
    .map((statement) => `${statement};`)
    .join('\n\n')
}
