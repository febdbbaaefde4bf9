/**
 * Database connection
 *
 * Opens (or creates) the SQLite file with better-sqlite3 and applies the
 * schema. Pass ':memory:' for a throwaway database.
 *
 * Usage:
 *   import { openDatabase } from '../database/getDatabase'
 *   const db = openDatabase(config.database.path)
 */

import Database from 'better-sqlite3'
import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { DATABASE_SCHEMA } from './schema'

export type SqliteDatabase = Database.Database

const IntegrityRowSchema = z.array(z.object({ integrity_check: z.string() }))

export function openDatabase(dbPath: string): SqliteDatabase {
  const inMemory = dbPath === ':memory:'
  const dbExists = !inMemory && fs.existsSync(dbPath)

  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true })
  }

  const db = new Database(dbPath)

  try {
    // Configure for performance
    if (!inMemory) db.pragma('journal_mode = WAL')
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')
    db.pragma('temp_store = MEMORY')

    if (dbExists) {
      console.log('[Database] Database loaded from:', dbPath)

      // Verify integrity
      const result = IntegrityRowSchema.parse(db.pragma('integrity_check'))
      if (result[0]?.integrity_check !== 'ok') {
        console.error('[Database] Integrity check failed:', result)
        throw new Error('Database integrity check failed')
      }
    } else {
      console.log(`[Database] New database created${inMemory ? ' (in memory)' : ''}`)
    }

    db.exec(DATABASE_SCHEMA)
    return db
  } catch (error) {
    console.error('[Database] Failed to initialize database:', error)
    db.close()
    throw error
  }
}
