import 'dotenv/config'
import { uuidSchema } from '@lightpath/schema'
import { createDatabase, listPorts, loadDatabaseConfig, log, logError, upsertPort } from '../src'

/**
 * Local development ports. Ids are fixed so re-running the seed refreshes the
 * same rows instead of adding new ones.
 */
const SEED_PORTS = [
  {
    portId: uuidSchema.parse('0f4e1b8a-3c2d-4e5f-8a9b-1c2d3e4f5a6b'),
    name: 'port-ams-1',
    vlans: '2-4094',
    bandwidth: 10_000,
  },
  {
    portId: uuidSchema.parse('5a6b7c8d-9e0f-4a1b-8c2d-3e4f5a6b7c8d'),
    name: 'port-ams-2',
    vlans: '100-199,300',
    bandwidth: 1_000,
  },
] as const

async function seed() {
  const { db, close } = createDatabase(loadDatabaseConfig())
  try {
    for (const port of SEED_PORTS) {
      await upsertPort(db, port)
    }
    const enabled = await listPorts(db, { enabledOnly: true })
    log(`Seeded ${SEED_PORTS.length} ports; ${enabled.length} enabled in total.`)
  } finally {
    await close()
  }
}

seed().catch((error) => {
  logError('Seed failed:', error)
  process.exit(1)
})
