import path from "node:path";
import { describe, expect, test } from "vitest";

import { openDb } from "../src/db/db.js";
import { chatMemoryMigrations } from "../src/db/migrations.js";
import { ChatMemoryStore } from "../src/memory/chatMemoryStore.js";
import { MemoryWriter } from "../src/memory/memoryWriter.js";
import type { CompletedTurn, MemorySink } from "../src/memory/sinks.js";
import { auditLogSink, readAuditLog, vectorMemorySink } from "../src/memory/sinks.js";
import { captureLogger, createFakeEmbedder, makeTempDir } from "./helpers.js";

const pair = {
  requestId: "req-1",
  userId: "alice",
  sessionId: "sess-1",
  query: "How do I redeploy staging?",
  answer: "Run the deploy pipeline.",
  now: new Date("2026-03-01T10:00:00.000Z")
};

function recordingSink(kind: MemorySink["kind"], fail = false): MemorySink & { turns: CompletedTurn[] } {
  const turns: CompletedTurn[] = [];
  return {
    kind,
    name: `recording-${kind}`,
    turns,
    async append(turn) {
      if (fail) throw new Error(`${kind} sink down`);
      turns.push(turn);
    }
  };
}

describe("MemoryWriter", () => {
  test("writes the user turn then the assistant turn to every sink", async () => {
    const vector = recordingSink("vector");
    const audit = recordingSink("audit");
    const writer = new MemoryWriter([vector, audit]);

    const report = await writer.write(pair);
    expect(report).toEqual({ attempted: 4, stored: 4, dropped: 0 });
    for (const sink of [vector, audit]) {
      expect(sink.turns.map((t) => [t.role, t.text])).toEqual([
        ["user", "How do I redeploy staging?"],
        ["assistant", "Run the deploy pipeline."]
      ]);
      expect(sink.turns[1]!.timestamp.getTime()).toBeGreaterThan(sink.turns[0]!.timestamp.getTime());
    }
    expect(writer.sinkKinds).toEqual(["vector", "audit"]);
  });

  test("a failing sink is logged and dropped without stopping the others", async () => {
    const { logger, records } = captureLogger();
    const audit = recordingSink("audit");
    const writer = new MemoryWriter([recordingSink("vector", true), audit], { logger });

    const report = await writer.write(pair);
    expect(report).toEqual({ attempted: 4, stored: 2, dropped: 2 });
    expect(audit.turns).toHaveLength(2);
    const dropped = records.filter((r) => r.event === "memory.write.dropped");
    expect(dropped.map((r) => [r.sink, r.role])).toEqual([
      ["vector", "user"],
      ["vector", "assistant"]
    ]);
  });

  test("schedule returns before anything is written; flush waits for it", async () => {
    const vector = recordingSink("vector");
    const writer = new MemoryWriter([vector]);

    writer.schedule(pair);
    expect(vector.turns).toHaveLength(0);
    expect(writer.pendingCount).toBe(1);

    await writer.flush();
    expect(vector.turns).toHaveLength(2);
    expect(writer.pendingCount).toBe(0);
  });

  test("vector and audit sinks persist the exchange", async () => {
    const store = new ChatMemoryStore(openDb(":memory:", { migrations: chatMemoryMigrations }), createFakeEmbedder());
    const auditPath = path.join(makeTempDir(), "audit", "history.jsonl");
    const writer = new MemoryWriter([vectorMemorySink(store), auditLogSink(auditPath)]);

    await writer.write(pair);

    expect(store.listRecent("alice", 5).map((t) => [t.role, t.sessionId])).toEqual([
      ["assistant", "sess-1"],
      ["user", "sess-1"]
    ]);
    const lines = await readAuditLog(auditPath, { userId: "alice" });
    expect(lines.map((l) => [l.role, l.user_id, l.request_id, l.timestamp])).toEqual([
      ["user", "alice", "req-1", "2026-03-01T10:00:00.000Z"],
      ["assistant", "alice", "req-1", "2026-03-01T10:00:00.001Z"]
    ]);
  });
});
