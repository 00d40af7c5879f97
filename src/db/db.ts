import Database from "better-sqlite3";

import { ensureParentDir } from "../util/fs.js";
import type { Migration } from "./migrations.js";

export type Db = Database.Database;

export type OpenDbOptions = {
  migrations?: Migration[];
  readonly?: boolean;
  /** WAL for long-lived stores; artifacts use the rollback journal so a closed file is self-contained. */
  wal?: boolean;
};

export function openDb(dbPath: string, opts: OpenDbOptions = {}): Db {
  const inMemory = dbPath === ":memory:";
  if (opts.readonly) {
    const db = new Database(dbPath, { readonly: true, fileMustExist: true });
    db.pragma("query_only = ON");
    return db;
  }

  if (!inMemory) ensureParentDir(dbPath);
  const db = new Database(dbPath);

  if (!inMemory && (opts.wal ?? true)) db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  if (opts.migrations) applyMigrations(db, opts.migrations);
  return db;
}

export function readMeta(db: Db, table: string): Map<string, string> {
  const hasTable = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name = ? LIMIT 1")
    .get(table);
  if (!hasTable) return new Map();
  const rows = db.prepare(`SELECT key, value FROM ${table}`).all() as { key: string; value: string }[];
  return new Map(rows.map((r) => [r.key, r.value]));
}

export function writeMeta(db: Db, table: string, entries: Record<string, string | number>): void {
  const upsert = db.prepare(
    `INSERT INTO ${table}(key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value`
  );
  const tx = db.transaction(() => {
    for (const [key, value] of Object.entries(entries)) upsert.run(key, String(value));
  });
  tx();
}

function applyMigrations(db: Db, migrations: Migration[]): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations(
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const appliedRows = db
    .prepare("SELECT version FROM schema_migrations ORDER BY version ASC")
    .all() as { version: number }[];
  const appliedVersions = new Set<number>(appliedRows.map((r) => r.version));

  const pending = migrations.filter((m) => !appliedVersions.has(m.version));
  if (pending.length === 0) return;

  const apply = db.transaction(() => {
    for (const m of pending) {
      db.exec(m.sql);
      db.prepare("INSERT INTO schema_migrations(version, name) VALUES(?, ?)").run(m.version, m.name);
    }
  });
  apply();
}
