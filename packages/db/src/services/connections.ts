import { eq } from 'drizzle-orm'
import { connectionInputSchema, type ConnectionInput, type Uuid } from '@lightpath/schema'
import type { Database } from '../client'
import type { Connection } from '../schema/connections'
import { connections } from '../schema/connections'
import type { Port } from '../schema/ports'

export type ConnectionWithPorts = Connection & { sourcePort: Port; destPort: Port }

/**
 * Record the deployed connection of a reservation after provisioning
 * succeeded. It shares the reservation's connection id and cascades with it.
 */
export async function createConnection(db: Database, input: ConnectionInput): Promise<Connection> {
  const parsed = connectionInputSchema.parse(input)
  const [row] = await db.insert(connections).values(parsed).returning()
  if (!row) {
    throw new Error('Connection insert returned no row')
  }
  return row
}

export async function getConnection(db: Database, connectionId: Uuid): Promise<ConnectionWithPorts | null> {
  const row = await db.query.connections.findFirst({
    where: eq(connections.connectionId, connectionId),
    with: { sourcePort: true, destPort: true },
  })
  return row ?? null
}
