import type { DatabaseConnection } from './types.js'
import { logger } from '../shared/logger.js'

type Migration = {
  version: number
  name: string
  up: (db: DatabaseConnection) => Promise<void>
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'collector_state',
    up: async (db) => {
      await db.query(`
        CREATE TABLE IF NOT EXISTS collector_state (
          node_address TEXT PRIMARY KEY,
          next_rewards_start_block TEXT NOT NULL,
          updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
        )
      `)
    }
  }
]

export const runMigrations = async (db: DatabaseConnection): Promise<void> => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `)

  const result = await db.query<{ version: number }>('SELECT version FROM migrations')
  const appliedVersions = new Set(result.rows.map(r => r.version))

  for (const migration of migrations) {
    if (!appliedVersions.has(migration.version)) {
      logger.info(`[DB] Applying migration ${migration.version}: ${migration.name}`)

      await db.transaction(async (tx) => {
        await migration.up(tx)
        await tx.query(
          'INSERT INTO migrations (version, name) VALUES ($1, $2)',
          [migration.version, migration.name]
        )
      })

      logger.info(`[DB] Migration ${migration.version} applied successfully`)
    }
  }
}
