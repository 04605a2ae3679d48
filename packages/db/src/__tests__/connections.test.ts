import { describe, it, expect } from 'vitest'
import { constraintName, sqlState } from '../errors'
import { connections } from '../schema/connections'
import { parameters } from '../schema/reservations'
import { pathTraces, paths, segments, stps } from '../schema/path_traces'
import { ports } from '../schema/ports'
import { createConnection, getConnection } from '../services/connections'
import { upsertPort } from '../services/ports'
import { replacePathTrace } from '../services/path-traces'
import { createReservation, deleteReservation, getReservation, setParameter } from '../services/reservations'
import type { Database } from '../client'
import { reservationInput, testUuid, useTestDatabase } from './helpers/test-db'

const portA = testUuid('a0000000-0000-4000-8000-00000000000a')
const portB = testUuid('b0000000-0000-4000-8000-00000000000b')

/** A reservation with a two-segment trace, a parameter and a connection. */
async function seedReservation(db: Database, tag: string) {
  const reservation = await createReservation(db, reservationInput())
  await replacePathTrace(db, reservation.connectionId, {
    pathTraceId: 'urn:ogf:network:example.org:2024:nsa:aggregator',
    agConnectionId: `ag-${tag}`,
    paths: [
      {
        segments: [
          { segmentId: 'nsa-1', upaConnectionId: `${tag}-1`, stps: [`${tag}-stp-1`, `${tag}-stp-2`] },
          { segmentId: 'nsa-2', upaConnectionId: `${tag}-2`, stps: [`${tag}-stp-3`] },
        ],
      },
    ],
  })
  await setParameter(db, reservation.connectionId, 'mtu', '9000')
  const connection = await createConnection(db, {
    connectionId: reservation.connectionId,
    bandwidth: 1000,
    sourcePortId: portA,
    sourceVlan: 150,
    destPortId: portB,
    destVlan: 300,
    subscriptionId: testUuid(`f0000000-0000-4000-8000-${tag.padStart(12, '0')}`),
  })
  return { reservation, connection }
}

describe('services/connections.ts', () => {
  const { db } = useTestDatabase()

  async function seedPorts() {
    await upsertPort(db, { portId: portA, name: 'port-a', vlans: '2-4094', bandwidth: 10000 })
    await upsertPort(db, { portId: portB, name: 'port-b', vlans: '300', bandwidth: 1000 })
  }

  async function counts() {
    return {
      pathTraces: (await db.select().from(pathTraces)).length,
      paths: (await db.select().from(paths)).length,
      segments: (await db.select().from(segments)).length,
      stps: (await db.select().from(stps)).length,
      parameters: (await db.select().from(parameters)).length,
      connections: (await db.select().from(connections)).length,
      ports: (await db.select().from(ports)).length,
    }
  }

  it('should load a connection with both ports', async () => {
    await seedPorts()
    const { reservation } = await seedReservation(db, '1')
    const connection = await getConnection(db, reservation.connectionId)

    expect(connection?.sourceVlan).toBe(150)
    expect(connection?.sourcePort.portId).toBe(portA)
    expect(connection?.destPort.vlans).toBe('300')
  })

  it('should return null without a connection', async () => {
    const reservation = await createReservation(db, reservationInput())
    expect(await getConnection(db, reservation.connectionId)).toBeNull()
  })

  it('should refuse a second connection with the same subscription', async () => {
    await seedPorts()
    await seedReservation(db, '1')
    const other = await createReservation(db, reservationInput())
    const error = await createConnection(db, {
      connectionId: other.connectionId,
      bandwidth: 1000,
      sourcePortId: portA,
      sourceVlan: 151,
      destPortId: portB,
      destVlan: 300,
      subscriptionId: testUuid('f0000000-0000-4000-8000-000000000001'),
    }).catch((caught: unknown) => caught)

    expect(sqlState(error)).toBe('23505')
    expect(constraintName(error)).toBe('connections_subscription_id_unique')
  })

  it('should refuse a connection without a reservation', async () => {
    await seedPorts()
    const error = await createConnection(db, {
      connectionId: testUuid('99999999-0000-4000-8000-000000000000'),
      bandwidth: 1000,
      sourcePortId: portA,
      sourceVlan: 150,
      destPortId: portB,
      destVlan: 300,
      subscriptionId: testUuid('f0000000-0000-4000-8000-000000000009'),
    }).catch((caught: unknown) => caught)

    expect(sqlState(error)).toBe('23503')
  })

  it('should cascade a reservation delete to exactly the rows it owns', async () => {
    await seedPorts()
    const first = await seedReservation(db, '1')
    await seedReservation(db, '2')

    expect(await counts()).toEqual({
      pathTraces: 2,
      paths: 2,
      segments: 4,
      stps: 6,
      parameters: 2,
      connections: 2,
      ports: 2,
    })

    expect(await deleteReservation(db, first.reservation.connectionId)).toBe(true)

    expect(await getReservation(db, first.reservation.connectionId)).toBeNull()
    expect(await counts()).toEqual({
      pathTraces: 1,
      paths: 1,
      segments: 2,
      stps: 3,
      parameters: 1,
      connections: 1,
      ports: 2,
    })
  })
})
