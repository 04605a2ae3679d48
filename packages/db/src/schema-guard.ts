import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core'
import {
  LifecycleStateMachine,
  ProvisioningStateMachine,
  ReservationStateMachine,
  type StateMachine,
} from '@lightpath/schema'
import { tablesInDependencyOrder } from './ddl'
import {
  lifecycleStateEnum,
  provisioningStateEnum,
  reservationStateEnum,
  stateEnumDrift,
} from './schema/enums'
import { ports } from './schema/ports'

export type Finding = {
  level: 'error' | 'warn'
  rule: string
  table: string
  detail: string
}

/**
 * Parents whose children are exclusively owned, so the child's foreign key
 * must cascade. Ports are referenced, never owned.
 */
const nonOwningParents = new Set([getTableConfig(ports).name])

/** Column name used for sibling positions in ordered collections. */
const ORDER_COLUMN = 'order'

function startsWith(columns: string[], prefix: string[]): boolean {
  return prefix.every((name, position) => columns[position] === name)
}

function sameSet(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((name) => b.includes(name))
}

/** Column lists of every index-backed structure on a table. */
function indexedColumnLists(table: PgTable): string[][] {
  const config = getTableConfig(table)
  const lists: string[][] = []
  for (const index of config.indexes) {
    const names: string[] = []
    for (const column of index.config.columns) {
      if (typeof column === 'object' && column !== null && 'name' in column && typeof column.name === 'string') {
        names.push(column.name)
      }
    }
    lists.push(names)
  }
  for (const primaryKey of config.primaryKeys) lists.push(primaryKey.columns.map((column) => column.name))
  for (const unique of config.uniqueConstraints) lists.push(unique.columns.map((column) => column.name))
  for (const column of config.columns) {
    if (column.primary) lists.push([column.name])
  }
  return lists
}

function checkForeignKeys(table: PgTable): Finding[] {
  const config = getTableConfig(table)
  const indexed = indexedColumnLists(table)
  const findings: Finding[] = []

  for (const foreignKey of config.foreignKeys) {
    const reference = foreignKey.reference()
    const columns = reference.columns.map((column) => column.name)
    const parent = getTableConfig(reference.foreignTable).name

    // Any column order works for the leading part as long as it is exactly the FK set.
    const covered = indexed.some(
      (list) => startsWith(list, columns) || sameSet(list.slice(0, columns.length), columns),
    )
    if (!covered) {
      findings.push({
        level: columns.length > 1 ? 'error' : 'warn',
        rule: 'foreign-key-index',
        table: config.name,
        detail: `Foreign key (${columns.join(', ')}) -> ${parent} has no index leading with its columns.`,
      })
    }

    if (!nonOwningParents.has(parent) && foreignKey.onDelete !== 'cascade') {
      findings.push({
        level: 'error',
        rule: 'owned-child-cascade',
        table: config.name,
        detail: `Foreign key (${columns.join(', ')}) -> ${parent} must be ON DELETE CASCADE.`,
      })
    }
    if (nonOwningParents.has(parent) && foreignKey.onDelete === 'cascade') {
      findings.push({
        level: 'error',
        rule: 'referenced-parent-no-cascade',
        table: config.name,
        detail: `Foreign key (${columns.join(', ')}) -> ${parent} must not cascade; ${parent} rows are never deleted.`,
      })
    }
  }
  return findings
}

function checkOrderedChildren(table: PgTable): Finding[] {
  const config = getTableConfig(table)
  if (!config.columns.some((column) => column.name === ORDER_COLUMN)) return []

  // The parent key is the foreign key whose parent the siblings share.
  const parentKeys = config.foreignKeys.map((foreignKey) =>
    foreignKey.reference().columns.map((column) => column.name),
  )
  const uniqueLists = [
    ...config.uniqueConstraints.map((unique) => unique.columns.map((column) => column.name)),
    ...config.indexes
      .filter((index) => index.config.unique)
      .map((index) =>
        index.config.columns.flatMap((column) =>
          typeof column === 'object' && column !== null && 'name' in column && typeof column.name === 'string'
            ? [column.name]
            : [],
        ),
      ),
  ]
  const guarded = parentKeys.some((parentKey) =>
    uniqueLists.some((list) => sameSet(list, [...parentKey, ORDER_COLUMN])),
  )
  return guarded
    ? []
    : [
        {
          level: 'error',
          rule: 'ordered-children-unique',
          table: config.name,
          detail: `"${ORDER_COLUMN}" needs a unique constraint over (parent key, ${ORDER_COLUMN}).`,
        },
      ]
}

function checkStateEnum<TState extends string, TEvent extends string>(
  columnEnum: { enumName: string; enumValues: readonly string[] },
  machine: StateMachine<TState, TEvent>,
): Finding[] {
  const drift = stateEnumDrift(columnEnum.enumValues, machine)
  if (drift.missing.length === 0 && drift.stale.length === 0) return []
  return [
    {
      level: 'error',
      rule: 'state-enum-drift',
      table: 'reservations',
      detail:
        `Enum ${columnEnum.enumName} differs from ${machine.name}: ` +
        `missing [${drift.missing.join(', ')}], stale [${drift.stale.join(', ')}].`,
    },
  ]
}

/** Check the declared schema against the store's integrity conventions. */
export function findSchemaFindings(tables: PgTable[] = tablesInDependencyOrder): Finding[] {
  return [
    ...tables.flatMap(checkForeignKeys),
    ...tables.flatMap(checkOrderedChildren),
    ...checkStateEnum(reservationStateEnum, ReservationStateMachine),
    ...checkStateEnum(provisioningStateEnum, ProvisioningStateMachine),
    ...checkStateEnum(lifecycleStateEnum, LifecycleStateMachine),
  ]
}
