import Database from "better-sqlite3";
import { UnsupportedSchemaError } from "../errors/catalog.js";

export const SCHEMA_VERSION = "1";

const CREATE_TABLES_SQL = [
  `CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS sources (
    name TEXT PRIMARY KEY,
    comment TEXT NOT NULL DEFAULT '',
    data_key TEXT NOT NULL UNIQUE,
    meta_key TEXT NOT NULL UNIQUE,
    plaintext_size INTEGER NOT NULL,
    encrypted_size INTEGER NOT NULL,
    fingerprint TEXT NOT NULL,
    created_at TEXT NOT NULL,
    orphaned_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS jobs (
    kind TEXT NOT NULL CHECK (kind IN ('retrieval', 'inventory', 'metadata')),
    subject TEXT NOT NULL,
    handle TEXT NOT NULL,
    options TEXT NOT NULL DEFAULT '{}',
    status TEXT NOT NULL
      CHECK (status IN ('requested', 'in-progress', 'ready', 'failed')),
    error TEXT,
    requested_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (kind, subject)
  )`,
  `CREATE TABLE IF NOT EXISTS retired_keys (
    key TEXT PRIMARY KEY,
    retired_at TEXT NOT NULL
  )`,
];

/**
 * Open/create a box database, create tables and check the schema version.
 * @throws UnsupportedSchemaError if the file was written by another schema version
 */
export function initializeBoxDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  try {
    db.pragma("journal_mode = WAL");

    db.transaction(() => {
      for (const sql of CREATE_TABLES_SQL) {
        db.exec(sql);
      }
      const row = db
        .prepare<[], { value: string }>(
          "SELECT value FROM settings WHERE key = 'schema_version'",
        )
        .get();
      if (!row) {
        db.prepare(
          "INSERT INTO settings (key, value) VALUES ('schema_version', ?)",
        ).run(SCHEMA_VERSION);
      } else if (row.value !== SCHEMA_VERSION) {
        throw new UnsupportedSchemaError(row.value, SCHEMA_VERSION);
      }
    })();
  } catch (err) {
    db.close();
    throw err;
  }

  return db;
}
