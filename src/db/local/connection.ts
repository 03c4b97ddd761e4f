import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { mkdirSync, readFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { createLogger } from '@/shared/lib/logger'
import * as schema from './schema'

const log = createLogger('database')

export type InventoryDatabase = BetterSQLite3Database<typeof schema>

export interface InventoryConnection {
  db: InventoryDatabase
  close: () => void
}

const SCHEMA_SQL_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url))

/**
 * Open the inventory database and create its tables when missing.
 * Pass `:memory:` for a throwaway database.
 */
export function openInventoryDatabase(databasePath: string): InventoryConnection {
  const inMemory = databasePath === ':memory:'
  if (!inMemory) {
    mkdirSync(dirname(databasePath), { recursive: true })
  }

  log.debug({ databasePath }, 'Opening inventory database')

  const sqliteDb = new Database(databasePath)

  try {
    if (!inMemory) {
      // WAL lets exports read while sales are written
      sqliteDb.pragma('journal_mode = WAL')
    }
    sqliteDb.pragma('foreign_keys = ON')
    sqliteDb.pragma('busy_timeout = 5000')

    sqliteDb.exec(readFileSync(SCHEMA_SQL_PATH, 'utf-8'))
  } catch (error) {
    sqliteDb.close()
    throw error
  }

  return {
    db: drizzle(sqliteDb, { schema }),
    close: () => {
      sqliteDb.close()
      log.debug({ databasePath }, 'Inventory database closed')
    }
  }
}
