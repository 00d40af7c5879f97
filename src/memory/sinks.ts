import { z } from "zod";

import { appendJsonl, readJsonl } from "../util/jsonl.js";
import type { ChatMemoryStore } from "./chatMemoryStore.js";
import type { ChatRole } from "./types.js";
import { ChatRoleSchema } from "./types.js";

export type CompletedTurn = {
  turnId: string;
  requestId: string;
  userId: string;
  sessionId: string;
  role: ChatRole;
  text: string;
  timestamp: Date;
};

export type MemorySinkKind = "vector" | "audit";

/** Every place a finished turn is recorded. All sinks share the same append contract. */
export type MemorySink = {
  kind: MemorySinkKind;
  name: string;
  append(turn: CompletedTurn): Promise<void>;
};

export function vectorMemorySink(store: ChatMemoryStore): MemorySink {
  return {
    kind: "vector",
    name: "chat-memory",
    async append(turn) {
      await store.append({
        turnId: turn.turnId,
        userId: turn.userId,
        sessionId: turn.sessionId,
        role: turn.role,
        text: turn.text,
        timestamp: turn.timestamp
      });
    }
  };
}

/**
 * Append-only JSONL history of every turn. Placeholder for an audit-grade
 * relational store; it takes the same turns through the same contract.
 */
export function auditLogSink(filePath: string): MemorySink {
  return {
    kind: "audit",
    name: `audit:${filePath}`,
    async append(turn) {
      appendJsonl(filePath, {
        turn_id: turn.turnId,
        request_id: turn.requestId,
        user_id: turn.userId,
        session_id: turn.sessionId,
        role: turn.role,
        text: turn.text,
        timestamp: turn.timestamp.toISOString()
      });
    }
  };
}

export const AuditRecordSchema = z.object({
  turn_id: z.string(),
  request_id: z.string(),
  user_id: z.string(),
  session_id: z.string(),
  role: ChatRoleSchema,
  text: z.string(),
  timestamp: z.string()
});

export type AuditRecord = z.infer<typeof AuditRecordSchema>;

/** Reads the audit history back, optionally for one user; malformed lines are skipped. */
export async function readAuditLog(filePath: string, filter: { userId?: string } = {}): Promise<AuditRecord[]> {
  const out: AuditRecord[] = [];
  for await (const rec of readJsonl(filePath, AuditRecordSchema)) {
    if (filter.userId === undefined || rec.user_id === filter.userId) out.push(rec);
  }
  return out;
}
