import type { Database } from '../client'
import { InvalidValueError } from '../errors'

/**
 * Ordered child set.
 *
 * The in-memory sequence is the source of truth for order: position `i` in
 * the set is `order = i` in storage. Every structural change keeps positions
 * contiguous and zero-based; `persistOrderedChildren` writes them back.
 */
export class OrderedChildSet<T> {
  private items: T[]

  constructor(items: Iterable<T> = []) {
    this.items = [...items]
  }

  /** Build from stored rows, trusting their `order` only for sorting. */
  static fromRows<TRow extends { order: number }>(rows: Iterable<TRow>): OrderedChildSet<TRow> {
    return new OrderedChildSet([...rows].sort((a, b) => a.order - b.order))
  }

  get size(): number {
    return this.items.length
  }

  at(position: number): T | undefined {
    return this.items[position]
  }

  indexOf(predicate: (item: T) => boolean): number {
    return this.items.findIndex(predicate)
  }

  append(item: T): this {
    this.items.push(item)
    return this
  }

  /** Insert at `position` (0..size); later siblings shift down by one. */
  insert(position: number, item: T): this {
    this.assertPosition(position, this.items.length)
    this.items.splice(position, 0, item)
    return this
  }

  removeAt(position: number): T {
    this.assertPosition(position, this.items.length - 1)
    const [removed] = this.items.splice(position, 1)
    if (removed === undefined) {
      throw new RangeError(`No child at position ${position}`)
    }
    return removed
  }

  /** Remove the first child matching `predicate`; null when none does. */
  remove(predicate: (item: T) => boolean): T | null {
    const position = this.items.findIndex(predicate)
    return position === -1 ? null : this.removeAt(position)
  }

  move(from: number, to: number): this {
    const item = this.removeAt(from)
    return this.insert(to, item)
  }

  toArray(): T[] {
    return [...this.items]
  }

  /** Every child with its contiguous zero-based order. */
  positions(): Array<{ item: T; order: number }> {
    return this.items.map((item, order) => ({ item, order }))
  }

  private assertPosition(position: number, max: number) {
    if (!Number.isInteger(position) || position < 0 || position > max) {
      throw new RangeError(`Position ${position} outside 0..${max}`)
    }
  }
}

/** Storage callbacks for one sibling set (one parent). */
export interface OrderedChildPersistence<T> {
  keyOf(child: T): string
  /** Keys and stored orders of every sibling currently persisted. */
  loadOrders(db: Database): Promise<Array<{ key: string; order: number }>>
  deleteByKeys(db: Database, keys: string[]): Promise<void>
  updateOrder(db: Database, key: string, order: number): Promise<void>
  insert(db: Database, child: T, order: number): Promise<void>
}

/**
 * Write a set's order back to storage in one transaction.
 *
 * Removed siblings are deleted, then survivors are lifted above every stored
 * position before receiving their final order, so the `(parent, order)`
 * unique constraint never sees two siblings on one position mid-way. New
 * siblings are inserted at their final order last. A key may appear only
 * once in the set; a duplicate is refused before anything is written.
 */
export async function persistOrderedChildren<T>(
  db: Database,
  set: OrderedChildSet<T>,
  persistence: OrderedChildPersistence<T>,
): Promise<void> {
  const keys = set.toArray().map((child) => persistence.keyOf(child))
  const wanted = new Set(keys)
  if (wanted.size !== keys.length) {
    const duplicate = keys.find((key, position) => keys.indexOf(key) !== position)
    throw new InvalidValueError(`Child "${duplicate ?? ''}" appears more than once in one parent.`)
  }

  await db.transaction(async (tx) => {
    const stored = await persistence.loadOrders(tx)

    const removed = stored.filter((row) => !wanted.has(row.key)).map((row) => row.key)
    if (removed.length > 0) {
      await persistence.deleteByKeys(tx, removed)
    }

    const storedOrders = new Map(stored.map((row) => [row.key, row.order]))
    const ceiling = Math.max(set.size, ...stored.map((row) => row.order + 1))
    const positions = set.positions()

    for (const { item, order } of positions) {
      const key = persistence.keyOf(item)
      if (storedOrders.has(key)) {
        await persistence.updateOrder(tx, key, ceiling + order)
      }
    }
    for (const { item, order } of positions) {
      const key = persistence.keyOf(item)
      if (storedOrders.has(key)) {
        await persistence.updateOrder(tx, key, order)
      } else {
        await persistence.insert(tx, item, order)
      }
    }
  })
}
