import { describe, expect, test } from "vitest";

import type { ScoredChunk } from "../src/corpus/types.js";
import { IsolationViolationError } from "../src/errors.js";
import type { ScoredTurn } from "../src/memory/types.js";
import { assembleContext, estimateTokens, gatherEvidence } from "../src/rag/context.js";
import type { CorpusSource, MemorySearcher, RoutingDecision } from "../src/rag/types.js";
import { captureLogger, makeIndex, vocabVector } from "./helpers.js";

function words(prefix: string, n: number): string {
  return Array.from({ length: n }, (_, i) => `${prefix}${i + 1}`).join(" ");
}

function chunk(id: number, text: string, score: number): ScoredChunk {
  return { chunk: { id, sourceCorpus: "docs", text, embedding: new Float32Array(4), metadata: { file: `${id}.md` } }, score };
}

function turn(text: string, score: number, ms: number): ScoredTurn {
  return {
    turn: { turnId: `t${ms}`, userId: "alice", sessionId: "s1", role: "user", text, embedding: new Float32Array(4), timestamp: new Date(ms) },
    score
  };
}

describe("assembleContext", () => {
  test("renders labeled segments without interleaving", () => {
    const ctx = assembleContext({
      knowledge: [chunk(1, "alpha beta gamma", 0.9)],
      history: [turn("hello there", 0.5, 1_000)],
      budgetTokens: 64,
      corpus: "docs"
    });
    expect(ctx.text).toBe(
      ["KNOWLEDGE (docs):", "[K1] 1.md (score 0.900)", "alpha beta gamma", "", "HISTORY:", "[H1] user: hello there"].join("\n")
    );
    expect(ctx.tokens).toBe(14);
    expect(ctx.dropped).toEqual({ knowledge: 0, history: 0 });
  });

  test("empty segments say so", () => {
    const ctx = assembleContext({ knowledge: [], history: [], budgetTokens: 64 });
    expect(ctx.text).toBe("KNOWLEDGE:\n(none)\n\nHISTORY:\n(none)");
    expect(ctx.tokens).toBe(4);
  });

  test("drops the lowest-scored item among segments with more than one item", () => {
    const ctx = assembleContext({
      knowledge: [chunk(1, words("k", 10), 0.9), chunk(2, words("k", 10), 0.3), chunk(3, words("k", 10), 0.6)],
      history: [turn(words("h", 10), 0.5, 1_000), turn(words("h", 10), 0.2, 2_000)],
      budgetTokens: 40,
      corpus: "docs"
    });
    expect(ctx.knowledge.map((k) => k.chunk.id)).toEqual([1]);
    expect(ctx.history.map((h) => h.score)).toEqual([0.5]);
    expect(ctx.dropped).toEqual({ knowledge: 2, history: 1 });
    expect(ctx.tokens).toBe(29);
    expect(ctx.clippedItems).toBe(0);
  });

  test("clips text once every segment is down to one item", () => {
    const ctx = assembleContext({
      knowledge: [chunk(1, words("w", 100), 0.9)],
      history: [turn(words("h", 50), 0.4, 1_000)],
      budgetTokens: 40
    });
    expect(ctx.tokens).toBe(40);
    expect(ctx.clippedItems).toBe(2);
    expect(ctx.text.split("\n")).toEqual([
      "KNOWLEDGE:",
      "[K1] 1.md (score 0.900)",
      "w1…",
      "",
      "HISTORY:",
      `[H1] user: ${words("h", 31)}…`
    ]);
  });

  test("never exceeds the budget and never empties a non-empty segment", () => {
    for (const budget of [32, 45, 64, 150]) {
      for (const nk of [0, 1, 4]) {
        for (const nh of [0, 1, 3]) {
          const knowledge = Array.from({ length: nk }, (_, i) => chunk(i + 1, words("k", 5 + i * 17), 0.9 - i * 0.1));
          const history = Array.from({ length: nh }, (_, i) => turn(words("h", 8 + i * 23), 0.7 - i * 0.2, 1_000 + i));
          const ctx = assembleContext({ knowledge, history, budgetTokens: budget, corpus: "docs" });
          expect(ctx.tokens).toBeLessThanOrEqual(budget);
          expect(estimateTokens(ctx.text)).toBe(ctx.tokens);
          expect(ctx.knowledge.length > 0).toBe(nk > 0);
          expect(ctx.history.length > 0).toBe(nh > 0);
        }
      }
    }
  });

  test("history renders oldest first", () => {
    const ctx = assembleContext({
      knowledge: [],
      history: [turn("second", 0.9, 2_000), turn("first", 0.1, 1_000)],
      budgetTokens: 64
    });
    expect(ctx.text.split("\n").slice(-2)).toEqual(["[H1] user: first", "[H2] user: second"]);
  });

  test("rejects a budget too small to hold the labels", () => {
    expect(() => assembleContext({ knowledge: [], history: [], budgetTokens: 10 })).toThrow(RangeError);
  });
});

describe("gatherEvidence", () => {
  const corpusDecision: RoutingDecision = {
    kind: "corpus",
    corpus: "docs",
    confidence: 0.8,
    scores: [{ corpus: "docs", score: 0.8 }],
    skipped: []
  };
  const history = { limit: 5, window: 0, minScore: 0 };

  test("searches the selected corpus and the user's memory", async () => {
    const index = makeIndex("docs", ["redeploy staging", "espresso", "rain"]);
    const corpora: CorpusSource = { corpora: ["docs"], get: () => index };
    const seen: string[] = [];
    const memory: MemorySearcher = {
      searchByUser(userId) {
        seen.push(userId);
        return [turn("earlier", 0.3, 1)];
      }
    };
    const ev = await gatherEvidence({
      decision: corpusDecision,
      queryEmbedding: vocabVector("staging"),
      userId: "alice",
      corpora,
      memory,
      topKFor: () => 2,
      history,
      logger: captureLogger().logger
    });
    expect(ev.decision).toBe(corpusDecision);
    expect(ev.knowledge.map((k) => k.chunk.text)).toEqual(["redeploy staging", "espresso"]);
    expect(ev.history).toHaveLength(1);
    expect(seen).toEqual(["alice"]);
  });

  test("a retrieval failure degrades to fallback; a memory failure empties history", async () => {
    const { logger, records } = captureLogger();
    const ev = await gatherEvidence({
      decision: corpusDecision,
      queryEmbedding: vocabVector("staging"),
      userId: "alice",
      corpora: {
        corpora: ["docs"],
        get: () => {
          throw new Error("disk gone");
        }
      },
      memory: {
        searchByUser: () => {
          throw new Error("memory db locked");
        }
      },
      topKFor: () => 2,
      history,
      logger
    });
    expect(ev.decision).toEqual({
      kind: "fallback",
      reason: "retrieval_failed",
      confidence: 0.8,
      scores: [{ corpus: "docs", score: 0.8 }],
      skipped: [],
      degradedFrom: "docs"
    });
    expect(ev.knowledge).toEqual([]);
    expect(ev.history).toEqual([]);
    expect(records.map((r) => r.event)).toEqual(["retrieval.failed", "history.unavailable"]);
  });

  test("an isolation violation is not swallowed", async () => {
    await expect(
      gatherEvidence({
        decision: { kind: "fallback", reason: "below_floor", confidence: 0.1, scores: [], skipped: [] },
        queryEmbedding: vocabVector("rain"),
        userId: "alice",
        corpora: { corpora: [], get: () => makeIndex("docs", ["rain"]) },
        memory: {
          searchByUser: () => {
            throw new IsolationViolationError("alice", "bob");
          }
        },
        topKFor: () => 2,
        history,
        logger: captureLogger().logger
      })
    ).rejects.toBeInstanceOf(IsolationViolationError);
  });
});
