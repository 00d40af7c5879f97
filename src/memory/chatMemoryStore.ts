import crypto from "node:crypto";

import { openDb, readMeta, writeMeta } from "../db/db.js";
import type { Db } from "../db/db.js";
import { chatMemoryMigrations } from "../db/migrations.js";
import { IndexUnavailableError, IsolationViolationError } from "../errors.js";
import { embedWithRetry } from "../providers/retry.js";
import type { EmbeddingsClient } from "../providers/types.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import { KeyedMutex } from "../util/mutex.js";
import { bufferToFloat32Array, compareScored, cosineSimilarity, float32ArrayToBuffer, pushTopK } from "../vector/vector.js";
import type { Scored } from "../vector/vector.js";
import type { ChatRole, ChatTurn, MemorySearchOptions, NewChatTurn, PrunePolicy, ScoredTurn } from "./types.js";
import { NewChatTurnSchema } from "./types.js";

export const CHAT_MEMORY_CORPUS = "chat_memory";

type TurnRow = {
  id: number;
  turn_id: string;
  user_id: string;
  session_id: string;
  role: ChatRole;
  text: string;
  vector_blob: Buffer;
  created_ms: number;
};

export type ChatMemoryStoreOptions = {
  logger?: Logger;
  retryDelayMs?: number;
};

/**
 * Per-user semantic memory of conversation turns, backed by SQLite.
 *
 * Writes for one user are serialized; different users write in parallel.
 * Searches are synchronous reads and never wait on a pending append.
 */
export class ChatMemoryStore {
  readonly fingerprint: string;
  private readonly db: Db;
  private readonly embedder: EmbeddingsClient;
  private readonly logger: Logger;
  private readonly retryDelayMs: number;
  private readonly locks = new KeyedMutex();

  constructor(db: Db, embedder: EmbeddingsClient, opts: ChatMemoryStoreOptions = {}) {
    this.db = db;
    this.embedder = embedder;
    this.fingerprint = embedder.fingerprint;
    this.logger = opts.logger ?? silentLogger;
    this.retryDelayMs = opts.retryDelayMs ?? 250;
    this.checkFingerprint();
  }

  static open(dbPath: string, embedder: EmbeddingsClient, opts: ChatMemoryStoreOptions = {}): ChatMemoryStore {
    const db = openDb(dbPath, { migrations: chatMemoryMigrations });
    try {
      return new ChatMemoryStore(db, embedder, opts);
    } catch (err) {
      db.close();
      throw err;
    }
  }

  /**
   * Embeds and stores one turn. A transient embedding failure is retried once;
   * a second failure rejects and nothing is stored.
   */
  async append(input: NewChatTurn): Promise<ChatTurn> {
    const turn = NewChatTurnSchema.parse(input);
    return await this.locks.run(turn.userId, async () => {
      const embedding = await embedWithRetry(this.embedder, turn.text, {
        retryDelayMs: this.retryDelayMs,
        onRetry: (err) => this.logger.warn("memory.embed.retry", { userId: turn.userId, error: err })
      });
      const stored: ChatTurn = {
        turnId: turn.turnId ?? crypto.randomUUID(),
        userId: turn.userId,
        sessionId: turn.sessionId,
        role: turn.role,
        text: turn.text,
        embedding,
        timestamp: turn.timestamp ?? new Date()
      };
      this.db
        .prepare(
          "INSERT INTO chat_turns(turn_id, user_id, session_id, role, text, dims, vector_blob, created_ms) VALUES (?, ?, ?, ?, ?, ?, ?, ?)"
        )
        .run(
          stored.turnId,
          stored.userId,
          stored.sessionId,
          stored.role,
          stored.text,
          embedding.length,
          float32ArrayToBuffer(embedding),
          stored.timestamp.getTime()
        );
      return stored;
    });
  }

  /** Top-k turns of `userId` only, by cosine similarity; ties prefer the newer turn. */
  searchByUser(userId: string, queryEmbedding: Float32Array, k: number, opts: MemorySearchOptions = {}): ScoredTurn[] {
    const limit = Math.max(0, Math.floor(k));
    if (limit === 0) return [];
    const window = Math.max(0, Math.floor(opts.limitTurns ?? 0));
    const minScore = opts.minScore ?? Number.NEGATIVE_INFINITY;

    const sql =
      "SELECT id, turn_id, user_id, session_id, role, text, vector_blob, created_ms FROM chat_turns WHERE user_id = ? ORDER BY created_ms DESC, id DESC" +
      (window > 0 ? " LIMIT ?" : "");
    const stmt = this.db.prepare(sql);
    const rows = (window > 0 ? stmt.iterate(userId, window) : stmt.iterate(userId)) as IterableIterator<TurnRow>;

    const top: Scored<ChatTurn>[] = [];
    for (const row of rows) {
      if (row.user_id !== userId) throw new IsolationViolationError(userId, row.user_id);
      const turn = toTurn(row);
      const score = cosineSimilarity(queryEmbedding, turn.embedding);
      if (score < minScore) continue;
      pushTopK(top, limit, { item: turn, score, tieKey: -row.id });
    }

    const result = top.sort(compareScored).map((s) => ({ turn: s.item, score: s.score }));
    for (const r of result) {
      if (r.turn.userId !== userId) throw new IsolationViolationError(userId, r.turn.userId);
    }
    return result;
  }

  /** Irreversibly deletes turns per user by age and/or count. Returns the number deleted. */
  async prune(policy: PrunePolicy): Promise<number> {
    if (policy.maxTurns === undefined && policy.maxAgeMs === undefined) return 0;
    if (policy.maxTurns !== undefined && (!Number.isInteger(policy.maxTurns) || policy.maxTurns < 0)) {
      throw new Error(`maxTurns must be a non-negative integer, got ${policy.maxTurns}`);
    }
    const now = (policy.now ?? new Date()).getTime();
    const users = policy.userId !== undefined ? [policy.userId] : this.listUsers();

    let deleted = 0;
    for (const userId of users) {
      deleted += await this.locks.run(userId, () => {
        let n = 0;
        const tx = this.db.transaction(() => {
          if (policy.maxAgeMs !== undefined) {
            n += this.db
              .prepare("DELETE FROM chat_turns WHERE user_id = ? AND created_ms < ?")
              .run(userId, now - policy.maxAgeMs).changes;
          }
          if (policy.maxTurns !== undefined) {
            n += this.db
              .prepare(
                `DELETE FROM chat_turns WHERE user_id = ? AND id NOT IN (
                   SELECT id FROM chat_turns WHERE user_id = ? ORDER BY created_ms DESC, id DESC LIMIT ?
                 )`
              )
              .run(userId, userId, policy.maxTurns).changes;
          }
        });
        tx();
        return n;
      });
    }

    if (deleted > 0) this.logger.info("memory.pruned", { userId: policy.userId ?? "*", deleted });
    return deleted;
  }

  async clear(userId: string): Promise<number> {
    return await this.locks.run(userId, () => this.db.prepare("DELETE FROM chat_turns WHERE user_id = ?").run(userId).changes);
  }

  listRecent(userId: string, limit: number): ChatTurn[] {
    const rows = this.db
      .prepare(
        "SELECT id, turn_id, user_id, session_id, role, text, vector_blob, created_ms FROM chat_turns WHERE user_id = ? ORDER BY created_ms DESC, id DESC LIMIT ?"
      )
      .all(userId, Math.max(0, Math.floor(limit))) as TurnRow[];
    return rows.map(toTurn);
  }

  countByUser(userId: string): number {
    const row = this.db.prepare("SELECT COUNT(1) AS c FROM chat_turns WHERE user_id = ?").get(userId) as { c: number };
    return row.c;
  }

  listUsers(): string[] {
    const rows = this.db.prepare("SELECT DISTINCT user_id FROM chat_turns ORDER BY user_id").all() as { user_id: string }[];
    return rows.map((r) => r.user_id);
  }

  close(): void {
    this.db.close();
  }

  private checkFingerprint(): void {
    const stored = readMeta(this.db, "memory_meta").get("fingerprint");
    if (stored === undefined) {
      writeMeta(this.db, "memory_meta", { fingerprint: this.fingerprint });
      return;
    }
    if (stored !== this.fingerprint) {
      throw new IndexUnavailableError({
        corpus: CHAT_MEMORY_CORPUS,
        reason: "fingerprint_mismatch",
        artifactPath: this.db.name,
        detail: `memory was embedded with ${stored}, active embedder is ${this.fingerprint}; clear or re-embed it`
      });
    }
  }
}

function toTurn(row: TurnRow): ChatTurn {
  return {
    turnId: row.turn_id,
    userId: row.user_id,
    sessionId: row.session_id,
    role: row.role,
    text: row.text,
    embedding: bufferToFloat32Array(row.vector_blob),
    timestamp: new Date(row.created_ms)
  };
}
