import Database from 'better-sqlite3'
import { ManifestCorruptionError } from '../errors/catalog.js'

const CREATE_TABLES_SQL = [
  `CREATE TABLE IF NOT EXISTS upload_manifests (
    dataset_id TEXT PRIMARY KEY,
    plan_fingerprint TEXT NOT NULL,
    shard_count INTEGER NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('open', 'closed')),
    created_at TEXT NOT NULL,
    closed_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS manifest_entries (
    dataset_id TEXT NOT NULL REFERENCES upload_manifests (dataset_id) ON DELETE CASCADE,
    shard_index INTEGER NOT NULL,
    revision TEXT NOT NULL,
    committed_at TEXT NOT NULL,
    PRIMARY KEY (dataset_id, shard_index)
  )`,
]

/**
 * Open/create the manifest ledger, create its tables and set WAL mode.
 * A file that is not a readable SQLite database is reported as
 * ManifestCorruptionError rather than replaced.
 */
export function initializeManifestDatabase(dbPath: string): Database.Database {
  let db: Database.Database | undefined
  try {
    db = new Database(dbPath)
    db.pragma('journal_mode = WAL')
    db.pragma('foreign_keys = ON')
    const check: unknown = db.pragma('quick_check', { simple: true })
    if (check !== 'ok') {
      throw new Error(`integrity check reported: ${String(check)}`)
    }
    for (const sql of CREATE_TABLES_SQL) {
      db.exec(sql)
    }
    return db
  } catch (err) {
    db?.close()
    const reason = err instanceof Error ? err.message : String(err)
    throw new ManifestCorruptionError(dbPath, `cannot open ledger: ${reason}`, err)
  }
}
