export type Migration = { version: number; name: string; sql: string };

/** Schema of a single corpus index artifact (`<indexDir>/<corpus>.sqlite`). */
export const indexArtifactMigrations: Migration[] = [
  {
    version: 1,
    name: "index_artifact",
    sql: `
      CREATE TABLE IF NOT EXISTS index_meta(
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chunks(
        id INTEGER PRIMARY KEY,
        text TEXT NOT NULL,
        metadata_json TEXT NOT NULL DEFAULT '{}',
        dims INTEGER NOT NULL,
        vector_blob BLOB NOT NULL
      );
    `
  }
];

export const chatMemoryMigrations: Migration[] = [
  {
    version: 1,
    name: "chat_turns",
    sql: `
      CREATE TABLE IF NOT EXISTS memory_meta(
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chat_turns(
        id INTEGER PRIMARY KEY,
        turn_id TEXT NOT NULL UNIQUE,
        user_id TEXT NOT NULL,
        session_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK(role IN ('user','assistant')),
        text TEXT NOT NULL,
        dims INTEGER NOT NULL,
        vector_blob BLOB NOT NULL,
        created_ms INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_chat_turns_user_time ON chat_turns(user_id, created_ms);
    `
  }
];

export const embeddingCacheMigrations: Migration[] = [
  {
    version: 1,
    name: "embedding_cache",
    sql: `
      CREATE TABLE IF NOT EXISTS embeddings(
        fingerprint TEXT NOT NULL,
        hash TEXT NOT NULL,
        dims INTEGER NOT NULL,
        vector_blob BLOB NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY(fingerprint, hash)
      );
    `
  }
];
