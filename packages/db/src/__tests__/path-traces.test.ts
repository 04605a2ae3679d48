import { describe, it, expect } from 'vitest'
import { eq } from 'drizzle-orm'
import type { Uuid } from '@lightpath/schema'
import type { Database } from '../client'
import { InvalidValueError, constraintName, sqlState } from '../errors'
import { paths, segments, stps } from '../schema/path_traces'
import { createReservation } from '../services/reservations'
import {
  deletePathTrace,
  getPathTrace,
  insertSegment,
  insertStp,
  listSegments,
  listStps,
  moveSegment,
  moveStp,
  removeSegment,
  removeStp,
  replacePathTrace,
} from '../services/path-traces'
import { reservationInput, useTestDatabase } from './helpers/test-db'

const stpOf = (name: string) => `urn:ogf:network:example.net:2024:topology:${name}`

/** A reservation with one path of four segments, s0..s3, each with two STPs. */
async function seedPath(db: Database): Promise<{ connectionId: Uuid; pathId: Uuid }> {
  const reservation = await createReservation(db, reservationInput())
  const trace = await replacePathTrace(db, reservation.connectionId, {
    pathTraceId: 'urn:ogf:network:example.org:2024:nsa:aggregator',
    agConnectionId: 'ag-conn-1',
    paths: [
      {
        segments: ['s0', 's1', 's2', 's3'].map((segmentId) => ({
          segmentId,
          upaConnectionId: `${segmentId}-upa`,
          stps: [stpOf(`${segmentId}-in`), stpOf(`${segmentId}-out`)],
        })),
      },
    ],
  })
  const [path] = trace.paths
  if (!path) throw new Error('seeded trace has no path')
  return { connectionId: reservation.connectionId, pathId: path.pathId }
}

function summary(rows: Array<{ segmentId: string; order: number }>): string[] {
  return rows.map((row) => `${row.order}:${row.segmentId}`)
}

describe('services/path-traces.ts', () => {
  const { db } = useTestDatabase()

  describe('replacePathTrace', () => {
    it('should number segments and STPs by input position', async () => {
      const { connectionId } = await seedPath(db)
      const trace = await getPathTrace(db, connectionId)

      expect(trace?.agConnectionId).toBe('ag-conn-1')
      expect(trace?.paths).toHaveLength(1)
      const segmentRows = trace?.paths[0]?.segments ?? []
      expect(summary(segmentRows)).toEqual(['0:s0', '1:s1', '2:s2', '3:s3'])
      expect(segmentRows[2]?.stps.map((stp) => [stp.order, stp.stpId])).toEqual([
        [0, stpOf('s2-in')],
        [1, stpOf('s2-out')],
      ])
    })

    it('should replace the previous snapshot entirely', async () => {
      const { connectionId } = await seedPath(db)
      await replacePathTrace(db, connectionId, {
        pathTraceId: 'urn:ogf:network:example.org:2024:nsa:aggregator',
        agConnectionId: 'ag-conn-2',
        paths: [{ segments: [{ segmentId: 'only', upaConnectionId: 'only-upa', stps: [stpOf('only-in')] }] }],
      })
      const trace = await getPathTrace(db, connectionId)

      expect(trace?.agConnectionId).toBe('ag-conn-2')
      expect(await db.select().from(paths)).toHaveLength(1)
      expect(await db.select().from(segments)).toHaveLength(1)
      expect(await db.select().from(stps)).toHaveLength(1)
    })

    it('should keep one trace per reservation', async () => {
      const { connectionId } = await seedPath(db)
      const trace = await replacePathTrace(db, connectionId, {
        pathTraceId: 'urn:ogf:network:example.org:2024:nsa:aggregator',
        agConnectionId: 'ag-conn-3',
        paths: [{ segments: [] }, { segments: [] }],
      })

      expect(trace.paths).toHaveLength(2)
      expect((await getPathTrace(db, connectionId))?.paths).toHaveLength(2)
    })

    it('should delete the trace with its tree', async () => {
      const { connectionId } = await seedPath(db)

      expect(await deletePathTrace(db, connectionId)).toBe(true)
      expect(await getPathTrace(db, connectionId)).toBeNull()
      expect(await db.select().from(segments)).toHaveLength(0)
      expect(await db.select().from(stps)).toHaveLength(0)
    })
  })

  describe('segments', () => {
    it('should close the gap left by a removed segment', async () => {
      const { pathId } = await seedPath(db)
      const remaining = await removeSegment(db, pathId, 's1')

      expect(summary(remaining)).toEqual(['0:s0', '1:s2', '2:s3'])
      // STPs of the removed segment go with it
      expect(await db.select().from(stps).where(eq(stps.segmentId, 's1'))).toHaveLength(0)
      expect(await db.select().from(stps)).toHaveLength(6)
    })

    it('should shift later segments when inserting', async () => {
      const { pathId } = await seedPath(db)
      const result = await insertSegment(
        db,
        pathId,
        { segmentId: 'sx', upaConnectionId: 'sx-upa', stps: [stpOf('sx-in')] },
        1,
      )

      expect(summary(result)).toEqual(['0:s0', '1:sx', '2:s1', '3:s2', '4:s3'])
      expect((await listStps(db, pathId, 'sx')).map((stp) => stp.stpId)).toEqual([stpOf('sx-in')])
    })

    it('should append when no position is given', async () => {
      const { pathId } = await seedPath(db)
      const result = await insertSegment(db, pathId, { segmentId: 'sy', upaConnectionId: 'sy-upa' })

      expect(summary(result)).toEqual(['0:s0', '1:s1', '2:s2', '3:s3', '4:sy'])
    })

    it('should move a segment and renumber its siblings', async () => {
      const { pathId } = await seedPath(db)
      const result = await moveSegment(db, pathId, 's3', 0)

      expect(summary(result)).toEqual(['0:s3', '1:s0', '2:s1', '3:s2'])
    })

    it('should leave the path untouched on a bad position', async () => {
      const { pathId } = await seedPath(db)

      await expect(moveSegment(db, pathId, 's0', 4)).rejects.toThrow(RangeError)
      expect(summary(await listSegments(db, pathId))).toEqual(['0:s0', '1:s1', '2:s2', '3:s3'])
    })

    it('should refuse a segment the path already holds and keep its orders', async () => {
      const { pathId } = await seedPath(db)

      await expect(
        insertSegment(db, pathId, { segmentId: 's0', upaConnectionId: 'other-upa' }, 1),
      ).rejects.toThrow(new InvalidValueError('Child "s0" appears more than once in one parent.'))
      const stored = await listSegments(db, pathId)
      expect(summary(stored)).toEqual(['0:s0', '1:s1', '2:s2', '3:s3'])
      expect(stored[0]?.upaConnectionId).toBe('s0-upa')
    })

    it('should report unknown segments', async () => {
      const { pathId } = await seedPath(db)

      await expect(removeSegment(db, pathId, 'nope')).rejects.toThrow(`Segment nope not found in path ${pathId}`)
    })

    it('should refuse two segments on one position', async () => {
      const { pathId } = await seedPath(db)
      const error = await db
        .insert(segments)
        .values({ segmentId: 'dup', pathId, upaConnectionId: 'dup-upa', order: 1 })
        .catch((caught: unknown) => caught)

      expect(sqlState(error)).toBe('23505')
      expect(constraintName(error)).toBe('segments_path_id_order_unique')
    })

    it('should refuse negative positions', async () => {
      const { pathId } = await seedPath(db)
      const error = await db
        .insert(segments)
        .values({ segmentId: 'neg', pathId, upaConnectionId: 'neg-upa', order: -1 })
        .catch((caught: unknown) => caught)

      expect(constraintName(error)).toBe('segments_order_non_negative_check')
    })
  })

  describe('stps', () => {
    it('should insert, move and remove STPs with contiguous orders', async () => {
      const { pathId } = await seedPath(db)
      const order = (rows: Array<{ stpId: string; order: number }>) =>
        rows.map((row) => `${row.order}:${row.stpId.split(':').pop()}`)

      expect(order(await insertStp(db, pathId, 's0', stpOf('s0-mid'), 1))).toEqual(['0:s0-in', '1:s0-mid', '2:s0-out'])
      expect(order(await moveStp(db, pathId, 's0', stpOf('s0-out'), 0))).toEqual(['0:s0-out', '1:s0-in', '2:s0-mid'])
      expect(order(await removeStp(db, pathId, 's0', stpOf('s0-in')))).toEqual(['0:s0-out', '1:s0-mid'])
      // Other segments are not renumbered
      expect(order(await listStps(db, pathId, 's1'))).toEqual(['0:s1-in', '1:s1-out'])
    })

    it('should refuse an STP the segment already holds and keep its orders', async () => {
      const { pathId } = await seedPath(db)

      await expect(insertStp(db, pathId, 's0', stpOf('s0-in'), 2)).rejects.toThrow(InvalidValueError)
      expect((await listStps(db, pathId, 's0')).map((stp) => [stp.order, stp.stpId])).toEqual([
        [0, stpOf('s0-in')],
        [1, stpOf('s0-out')],
      ])
    })

    it('should refuse STPs of a segment that does not exist', async () => {
      const { pathId } = await seedPath(db)
      const error = await db
        .insert(stps)
        .values({ stpId: stpOf('orphan'), segmentId: 'missing', pathId, order: 0 })
        .catch((caught: unknown) => caught)

      expect(sqlState(error)).toBe('23503')
      expect(constraintName(error)).toBe('stps_segment_fk')
    })
  })
})
