import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import { DuplicateError } from "../errors/catalog.js";
import type { Source } from "./types.js";

export interface ObjectKeys {
  dataKey: string;
  metaKey: string;
}

/** Encrypted Metadata Store: the box's record of known sources. */
export interface SourceStore {
  /** @throws DuplicateError if the name or one of the keys is taken */
  insert(source: Source): void;
  find(name: string): Source | undefined;
  findByKey(key: string): Source | undefined;
  /** Sorted by name, case-insensitively. */
  list(): Source[];
  delete(name: string): boolean;
  setOrphaned(name: string, orphanedAt: string | null): void;
  /** True if the key belongs to a live source or has been retired. */
  isKeyKnown(key: string): boolean;
  retireKeys(keys: readonly string[], retiredAt: string): void;
  /** Fresh `<uuid>.data` / `<uuid>.meta` pair that was never used in this box. */
  allocateKeys(): ObjectKeys;
}

interface RawRow {
  name: string;
  comment: string;
  data_key: string;
  meta_key: string;
  plaintext_size: number;
  encrypted_size: number;
  fingerprint: string;
  created_at: string;
  orphaned_at: string | null;
}

function rowToSource(row: RawRow): Source {
  return {
    name: row.name,
    comment: row.comment,
    dataKey: row.data_key,
    metaKey: row.meta_key,
    plaintextSize: row.plaintext_size,
    encryptedSize: row.encrypted_size,
    fingerprint: row.fingerprint,
    createdAt: row.created_at,
    orphanedAt: row.orphaned_at,
  };
}

export function objectKeysFor(id: string): ObjectKeys {
  return { dataKey: `${id}.data`, metaKey: `${id}.meta` };
}

export function createSourceStore(
  db: Database.Database,
  generateId: () => string = randomUUID,
): SourceStore {
  const insertStmt = db.prepare<RawRow>(
    `INSERT INTO sources (name, comment, data_key, meta_key, plaintext_size,
       encrypted_size, fingerprint, created_at, orphaned_at)
     VALUES (@name, @comment, @data_key, @meta_key, @plaintext_size,
       @encrypted_size, @fingerprint, @created_at, @orphaned_at)`,
  );

  const findStmt = db.prepare<{ name: string }, RawRow>(
    "SELECT * FROM sources WHERE name = @name",
  );

  const findByKeyStmt = db.prepare<{ key: string }, RawRow>(
    "SELECT * FROM sources WHERE data_key = @key OR meta_key = @key",
  );

  const listStmt = db.prepare<[], RawRow>(
    "SELECT * FROM sources ORDER BY name COLLATE NOCASE ASC, name ASC",
  );

  const deleteStmt = db.prepare<{ name: string }>(
    "DELETE FROM sources WHERE name = @name",
  );

  const setOrphanedStmt = db.prepare<{
    name: string;
    orphaned_at: string | null;
  }>("UPDATE sources SET orphaned_at = @orphaned_at WHERE name = @name");

  const keyKnownStmt = db.prepare<{ key: string }, { known: number }>(
    `SELECT 1 AS known FROM sources WHERE data_key = @key OR meta_key = @key
     UNION ALL
     SELECT 1 AS known FROM retired_keys WHERE key = @key
     LIMIT 1`,
  );

  const retireStmt = db.prepare<{ key: string; retired_at: string }>(
    "INSERT OR IGNORE INTO retired_keys (key, retired_at) VALUES (@key, @retired_at)",
  );

  function isKeyKnown(key: string): boolean {
    return keyKnownStmt.get({ key }) !== undefined;
  }

  return {
    insert(source) {
      try {
        insertStmt.run({
          name: source.name,
          comment: source.comment,
          data_key: source.dataKey,
          meta_key: source.metaKey,
          plaintext_size: source.plaintextSize,
          encrypted_size: source.encryptedSize,
          fingerprint: source.fingerprint,
          created_at: source.createdAt,
          orphaned_at: source.orphanedAt,
        });
      } catch (err) {
        if (
          err instanceof Database.SqliteError &&
          err.code.startsWith("SQLITE_CONSTRAINT")
        ) {
          throw new DuplicateError(`Source already exists: ${source.name}`, {
            source: source.name,
          });
        }
        throw err;
      }
    },

    find(name) {
      const row = findStmt.get({ name });
      return row ? rowToSource(row) : undefined;
    },

    findByKey(key) {
      const row = findByKeyStmt.get({ key });
      return row ? rowToSource(row) : undefined;
    },

    list() {
      return listStmt.all().map(rowToSource);
    },

    delete(name) {
      return deleteStmt.run({ name }).changes > 0;
    },

    setOrphaned(name, orphanedAt) {
      setOrphanedStmt.run({ name, orphaned_at: orphanedAt });
    },

    isKeyKnown,

    retireKeys(keys, retiredAt) {
      for (const key of keys) {
        retireStmt.run({ key, retired_at: retiredAt });
      }
    },

    allocateKeys() {
      for (;;) {
        const keys = objectKeysFor(generateId());
        if (!isKeyKnown(keys.dataKey) && !isKeyKnown(keys.metaKey)) {
          return keys;
        }
      }
    },
  };
}
