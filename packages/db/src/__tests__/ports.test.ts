import { describe, it, expect } from 'vitest'
import { eq } from 'drizzle-orm'
import { PortUnavailableError, constraintName, sqlState } from '../errors'
import { ports } from '../schema/ports'
import { createConnection, getConnection } from '../services/connections'
import {
  assertPortSelectable,
  getPort,
  getPortByName,
  listPorts,
  setPortEnabled,
  upsertPort,
} from '../services/ports'
import { createReservation } from '../services/reservations'
import { reservationInput, testUuid, useTestDatabase } from './helpers/test-db'

const portA = testUuid('a0000000-0000-4000-8000-00000000000a')
const portB = testUuid('b0000000-0000-4000-8000-00000000000b')
const subscription = testUuid('c0000000-0000-4000-8000-00000000000c')

describe('services/ports.ts', () => {
  const { db } = useTestDatabase()

  async function seedPorts() {
    await upsertPort(db, { portId: portA, name: 'port-a', vlans: '2-4094', bandwidth: 10000 })
    await upsertPort(db, {
      portId: portB,
      name: 'port-b',
      vlans: '100-199,300',
      remoteStp: 'urn:ogf:network:example.org:2024:topology:peer-1',
      bandwidth: 1000,
    })
  }

  describe('upsertPort', () => {
    it('should insert enabled ports', async () => {
      await seedPorts()
      const port = await getPortByName(db, 'port-b')

      expect(port?.portId).toBe(portB)
      expect(port?.enabled).toBe(true)
      expect(port?.remoteStp).toBe('urn:ogf:network:example.org:2024:topology:peer-1')
    })

    it('should refresh an existing port in place', async () => {
      await seedPorts()
      await upsertPort(db, { portId: portA, name: 'port-a', vlans: '10-20', bandwidth: 40000 })

      const port = await getPort(db, portA)
      expect(port?.vlans).toBe('10-20')
      expect(port?.bandwidth).toBe(40000)
      expect(await listPorts(db)).toHaveLength(2)
    })

    it('should refuse a second port with the same name', async () => {
      await seedPorts()
      const error = await upsertPort(db, {
        portId: testUuid('d0000000-0000-4000-8000-00000000000d'),
        name: 'port-a',
        vlans: '2-4094',
        bandwidth: 10000,
      }).catch((caught: unknown) => caught)

      expect(sqlState(error)).toBe('23505')
      expect(constraintName(error)).toBe('ports_name_unique')
    })

    it('should refuse invalid VLAN ranges before writing', async () => {
      await expect(
        upsertPort(db, { portId: portA, name: 'port-a', vlans: '0-10', bandwidth: 10000 }),
      ).rejects.toThrow('VLAN 0 outside 1-4094')
    })
  })

  describe('setPortEnabled', () => {
    it('should hide disabled ports from selection lists only', async () => {
      await seedPorts()
      await setPortEnabled(db, portA, false)

      expect((await listPorts(db, { enabledOnly: true })).map((port) => port.name)).toEqual(['port-b'])
      expect((await listPorts(db)).map((port) => port.name)).toEqual(['port-a', 'port-b'])
    })

    it('should leave connections on a disabled port intact', async () => {
      await seedPorts()
      const reservation = await createReservation(db, reservationInput())
      await createConnection(db, {
        connectionId: reservation.connectionId,
        bandwidth: 1000,
        sourcePortId: portA,
        sourceVlan: 150,
        destPortId: portB,
        destVlan: 300,
        subscriptionId: subscription,
      })

      await setPortEnabled(db, portA, false)
      const connection = await getConnection(db, reservation.connectionId)

      expect(connection?.sourcePort.name).toBe('port-a')
      expect(connection?.sourcePort.enabled).toBe(false)
      expect(connection?.destPort.name).toBe('port-b')
    })

    it('should return null for unknown ports', async () => {
      expect(await setPortEnabled(db, testUuid('e0000000-0000-4000-8000-00000000000e'), false)).toBeNull()
    })
  })

  describe('assertPortSelectable', () => {
    it('should accept an enabled port offering the VLAN', async () => {
      await seedPorts()
      const port = await getPort(db, portB)
      if (!port) throw new Error('port-b missing')

      expect(() => assertPortSelectable(port, 300)).not.toThrow()
      expect(() => assertPortSelectable(port)).not.toThrow()
    })

    it('should refuse a VLAN the port does not offer', async () => {
      await seedPorts()
      const port = await getPort(db, portB)
      if (!port) throw new Error('port-b missing')

      expect(() => assertPortSelectable(port, 5)).toThrow('Port "port-b" is unavailable: VLAN 5 is not in 100-199,300')
    })

    it('should refuse a disabled port', async () => {
      await seedPorts()
      const port = await setPortEnabled(db, portA, false)
      if (!port) throw new Error('port-a missing')

      expect(() => assertPortSelectable(port, 100)).toThrow(PortUnavailableError)
      expect(() => assertPortSelectable(port, 100)).toThrow('Port "port-a" is unavailable: port is disabled')
    })
  })

  it('should refuse to delete a port that connections reference', async () => {
    await seedPorts()
    const reservation = await createReservation(db, reservationInput())
    await createConnection(db, {
      connectionId: reservation.connectionId,
      bandwidth: 1000,
      sourcePortId: portA,
      sourceVlan: 150,
      destPortId: portB,
      destVlan: 300,
      subscriptionId: subscription,
    })

    const error = await db
      .delete(ports)
      .where(eq(ports.portId, portA))
      .catch((caught: unknown) => caught)
    expect(sqlState(error)).toBe('23503')
  })
})
