import { asc, eq } from 'drizzle-orm'
import { VlanRanges, portInputSchema, type PortInput, type Uuid } from '@lightpath/schema'
import type { Database } from '../client'
import { PortUnavailableError } from '../errors'
import { ports, type Port } from '../schema/ports'

/**
 * Insert or refresh a port as known in the orchestrator.
 *
 * There is deliberately no delete: connections keep pointing at ports.
 * Use `setPortEnabled(..., false)` to take a port out of service.
 */
export async function upsertPort(db: Database, input: PortInput): Promise<Port> {
  const parsed = portInputSchema.parse(input)
  const values = {
    portId: parsed.portId,
    name: parsed.name,
    vlans: parsed.vlans,
    remoteStp: parsed.remoteStp ?? null,
    bandwidth: parsed.bandwidth,
    enabled: parsed.enabled,
  }
  const [row] = await db
    .insert(ports)
    .values(values)
    .onConflictDoUpdate({
      target: ports.portId,
      set: {
        name: values.name,
        vlans: values.vlans,
        remoteStp: values.remoteStp,
        bandwidth: values.bandwidth,
        enabled: values.enabled,
      },
    })
    .returning()
  if (!row) {
    throw new Error('Port upsert returned no row')
  }
  return row
}

export async function getPort(db: Database, portId: Uuid): Promise<Port | null> {
  const [row] = await db.select().from(ports).where(eq(ports.portId, portId)).limit(1)
  return row ?? null
}

export async function getPortByName(db: Database, name: string): Promise<Port | null> {
  const [row] = await db.select().from(ports).where(eq(ports.name, name)).limit(1)
  return row ?? null
}

export async function listPorts(
  db: Database,
  options: { enabledOnly?: boolean } = {},
): Promise<Port[]> {
  const query = db.select().from(ports)
  return options.enabledOnly
    ? query.where(eq(ports.enabled, true)).orderBy(asc(ports.name))
    : query.orderBy(asc(ports.name))
}

/** Enable or disable a port. Existing connections are not touched. */
export async function setPortEnabled(
  db: Database,
  portId: Uuid,
  enabled: boolean,
): Promise<Port | null> {
  const [row] = await db.update(ports).set({ enabled }).where(eq(ports.portId, portId)).returning()
  return row ?? null
}

/**
 * Caller policy for new reservations: the port must be enabled and, when a
 * VLAN is given, offer it.
 */
export function assertPortSelectable(port: Port, vlan?: number): void {
  if (!port.enabled) {
    throw new PortUnavailableError(port.name, 'port is disabled')
  }
  if (vlan !== undefined && !VlanRanges.parse(port.vlans).contains(vlan)) {
    throw new PortUnavailableError(port.name, `VLAN ${vlan} is not in ${port.vlans}`)
  }
}
