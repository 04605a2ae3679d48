import { and, asc, eq, inArray } from 'drizzle-orm'
import {
  pathTraceInputSchema,
  segmentInputSchema,
  type PathTraceInput,
  type SegmentInput,
  type Uuid,
} from '@lightpath/schema'
import type { Database } from '../client'
import { newUuid } from '../codecs'
import {
  pathTraces,
  paths,
  segments,
  stps,
  type Path,
  type PathTrace,
  type Segment,
  type SegmentStp,
} from '../schema/path_traces'
import {
  OrderedChildSet,
  persistOrderedChildren,
  type OrderedChildPersistence,
} from './ordered-children'

export type SegmentTree = Segment & { stps: SegmentStp[] }
export type PathTree = Path & { segments: SegmentTree[] }
export type PathTraceTree = PathTrace & { paths: PathTree[] }

/**
 * Replace a reservation's path trace with a fresh snapshot.
 *
 * The old trace (and by cascade its paths, segments and stps) is deleted and
 * the new tree inserted in one transaction. Segment and STP orders are the
 * array positions of the input.
 */
export async function replacePathTrace(
  db: Database,
  connectionId: Uuid,
  input: PathTraceInput,
): Promise<PathTraceTree> {
  const parsed = pathTraceInputSchema.parse(input)
  return db.transaction(async (tx) => {
    await tx.delete(pathTraces).where(eq(pathTraces.connectionId, connectionId))

    const [trace] = await tx
      .insert(pathTraces)
      .values({
        pathTraceId: parsed.pathTraceId,
        agConnectionId: parsed.agConnectionId,
        connectionId,
      })
      .returning()
    if (!trace) {
      throw new Error('Path trace insert returned no row')
    }

    const pathTrees: PathTree[] = []
    for (const pathInput of parsed.paths) {
      const [path] = await tx
        .insert(paths)
        .values({
          pathId: newUuid(),
          pathTraceId: trace.pathTraceId,
          agConnectionId: trace.agConnectionId,
        })
        .returning()
      if (!path) {
        throw new Error('Path insert returned no row')
      }

      const segmentTrees: SegmentTree[] = []
      for (const [segmentOrder, segmentInput] of pathInput.segments.entries()) {
        const [segment] = await tx
          .insert(segments)
          .values({
            segmentId: segmentInput.segmentId,
            pathId: path.pathId,
            upaConnectionId: segmentInput.upaConnectionId,
            order: segmentOrder,
          })
          .returning()
        if (!segment) {
          throw new Error('Segment insert returned no row')
        }
        const stpRows =
          segmentInput.stps.length === 0
            ? []
            : await tx
                .insert(stps)
                .values(
                  segmentInput.stps.map((stpId, stpOrder) => ({
                    stpId,
                    segmentId: segment.segmentId,
                    pathId: path.pathId,
                    order: stpOrder,
                  })),
                )
                .returning()
        segmentTrees.push({ ...segment, stps: stpRows.sort((a, b) => a.order - b.order) })
      }
      pathTrees.push({ ...path, segments: segmentTrees })
    }

    return { ...trace, paths: pathTrees }
  })
}

/** The reservation's trace with paths, segments and stps in order, or null. */
export async function getPathTrace(db: Database, connectionId: Uuid): Promise<PathTraceTree | null> {
  const [trace] = await db
    .select()
    .from(pathTraces)
    .where(eq(pathTraces.connectionId, connectionId))
    .limit(1)
  if (!trace) return null

  const pathRows = await db
    .select()
    .from(paths)
    .where(and(eq(paths.pathTraceId, trace.pathTraceId), eq(paths.agConnectionId, trace.agConnectionId)))
  const pathIds = pathRows.map((path) => path.pathId)
  if (pathIds.length === 0) return { ...trace, paths: [] }

  const segmentRows = await db
    .select()
    .from(segments)
    .where(inArray(segments.pathId, pathIds))
    .orderBy(asc(segments.pathId), asc(segments.order))
  const stpRows = await db
    .select()
    .from(stps)
    .where(inArray(stps.pathId, pathIds))
    .orderBy(asc(stps.pathId), asc(stps.segmentId), asc(stps.order))

  return {
    ...trace,
    paths: pathRows.map((path) => ({
      ...path,
      segments: segmentRows
        .filter((segment) => segment.pathId === path.pathId)
        .map((segment) => ({
          ...segment,
          stps: stpRows.filter(
            (stp) => stp.pathId === segment.pathId && stp.segmentId === segment.segmentId,
          ),
        })),
    })),
  }
}

export async function deletePathTrace(db: Database, connectionId: Uuid): Promise<boolean> {
  const deleted = await db
    .delete(pathTraces)
    .where(eq(pathTraces.connectionId, connectionId))
    .returning({ pathTraceId: pathTraces.pathTraceId })
  return deleted.length > 0
}

// -----------------------------------------------------------------------------
// Segments within a path
// -----------------------------------------------------------------------------

type SegmentChild = Pick<Segment, 'segmentId' | 'upaConnectionId'>

function segmentPersistence(pathId: Uuid): OrderedChildPersistence<SegmentChild> {
  return {
    keyOf: (segment) => segment.segmentId,
    async loadOrders(db) {
      const rows = await db
        .select({ key: segments.segmentId, order: segments.order })
        .from(segments)
        .where(eq(segments.pathId, pathId))
      return rows
    },
    async deleteByKeys(db, keys) {
      await db.delete(segments).where(and(eq(segments.pathId, pathId), inArray(segments.segmentId, keys)))
    },
    async updateOrder(db, key, order) {
      await db
        .update(segments)
        .set({ order })
        .where(and(eq(segments.pathId, pathId), eq(segments.segmentId, key)))
    },
    async insert(db, segment, order) {
      await db.insert(segments).values({ ...segment, pathId, order })
    },
  }
}

export async function listSegments(db: Database, pathId: Uuid): Promise<Segment[]> {
  return db.select().from(segments).where(eq(segments.pathId, pathId)).orderBy(asc(segments.order))
}

async function loadSegmentSet(db: Database, pathId: Uuid): Promise<OrderedChildSet<SegmentChild>> {
  return OrderedChildSet.fromRows(await listSegments(db, pathId))
}

/**
 * Insert a segment at `position` (defaults to the end); later segments move
 * down one place. STPs are inserted with it, in the given order.
 */
export async function insertSegment(
  db: Database,
  pathId: Uuid,
  input: SegmentInput,
  position?: number,
): Promise<Segment[]> {
  const parsed = segmentInputSchema.parse(input)
  await db.transaction(async (tx) => {
    const set = await loadSegmentSet(tx, pathId)
    set.insert(position ?? set.size, { segmentId: parsed.segmentId, upaConnectionId: parsed.upaConnectionId })
    await persistOrderedChildren(tx, set, segmentPersistence(pathId))
    if (parsed.stps.length > 0) {
      await tx.insert(stps).values(
        parsed.stps.map((stpId, order) => ({ stpId, segmentId: parsed.segmentId, pathId, order })),
      )
    }
  })
  return listSegments(db, pathId)
}

/** Remove a segment (its stps cascade) and close the gap it leaves. */
export async function removeSegment(db: Database, pathId: Uuid, segmentId: string): Promise<Segment[]> {
  await db.transaction(async (tx) => {
    const set = await loadSegmentSet(tx, pathId)
    if (set.remove((segment) => segment.segmentId === segmentId) === null) {
      throw new Error(`Segment ${segmentId} not found in path ${pathId}`)
    }
    await persistOrderedChildren(tx, set, segmentPersistence(pathId))
  })
  return listSegments(db, pathId)
}

export async function moveSegment(
  db: Database,
  pathId: Uuid,
  segmentId: string,
  position: number,
): Promise<Segment[]> {
  await db.transaction(async (tx) => {
    const set = await loadSegmentSet(tx, pathId)
    const from = set.indexOf((segment) => segment.segmentId === segmentId)
    if (from === -1) {
      throw new Error(`Segment ${segmentId} not found in path ${pathId}`)
    }
    set.move(from, position)
    await persistOrderedChildren(tx, set, segmentPersistence(pathId))
  })
  return listSegments(db, pathId)
}

// -----------------------------------------------------------------------------
// STPs within a segment
// -----------------------------------------------------------------------------

function stpPersistence(pathId: Uuid, segmentId: string): OrderedChildPersistence<string> {
  const ofSegment = and(eq(stps.pathId, pathId), eq(stps.segmentId, segmentId))
  return {
    keyOf: (stpId) => stpId,
    async loadOrders(db) {
      return db.select({ key: stps.stpId, order: stps.order }).from(stps).where(ofSegment)
    },
    async deleteByKeys(db, keys) {
      await db.delete(stps).where(and(ofSegment, inArray(stps.stpId, keys)))
    },
    async updateOrder(db, key, order) {
      await db
        .update(stps)
        .set({ order })
        .where(and(ofSegment, eq(stps.stpId, key)))
    },
    async insert(db, stpId, order) {
      await db.insert(stps).values({ stpId, segmentId, pathId, order })
    },
  }
}

export async function listStps(db: Database, pathId: Uuid, segmentId: string): Promise<SegmentStp[]> {
  return db
    .select()
    .from(stps)
    .where(and(eq(stps.pathId, pathId), eq(stps.segmentId, segmentId)))
    .orderBy(asc(stps.order))
}

async function loadStpSet(db: Database, pathId: Uuid, segmentId: string): Promise<OrderedChildSet<string>> {
  const rows = await listStps(db, pathId, segmentId)
  return new OrderedChildSet(OrderedChildSet.fromRows(rows).toArray().map((row) => row.stpId))
}

export async function insertStp(
  db: Database,
  pathId: Uuid,
  segmentId: string,
  stpId: string,
  position?: number,
): Promise<SegmentStp[]> {
  await db.transaction(async (tx) => {
    const set = await loadStpSet(tx, pathId, segmentId)
    set.insert(position ?? set.size, stpId)
    await persistOrderedChildren(tx, set, stpPersistence(pathId, segmentId))
  })
  return listStps(db, pathId, segmentId)
}

export async function removeStp(
  db: Database,
  pathId: Uuid,
  segmentId: string,
  stpId: string,
): Promise<SegmentStp[]> {
  await db.transaction(async (tx) => {
    const set = await loadStpSet(tx, pathId, segmentId)
    if (set.remove((candidate) => candidate === stpId) === null) {
      throw new Error(`STP ${stpId} not found in segment ${segmentId}`)
    }
    await persistOrderedChildren(tx, set, stpPersistence(pathId, segmentId))
  })
  return listStps(db, pathId, segmentId)
}

export async function moveStp(
  db: Database,
  pathId: Uuid,
  segmentId: string,
  stpId: string,
  position: number,
): Promise<SegmentStp[]> {
  await db.transaction(async (tx) => {
    const set = await loadStpSet(tx, pathId, segmentId)
    const from = set.indexOf((candidate) => candidate === stpId)
    if (from === -1) {
      throw new Error(`STP ${stpId} not found in segment ${segmentId}`)
    }
    set.move(from, position)
    await persistOrderedChildren(tx, set, stpPersistence(pathId, segmentId))
  })
  return listStps(db, pathId, segmentId)
}
