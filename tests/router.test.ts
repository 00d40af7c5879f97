import { describe, expect, test } from "vitest";

import { IndexUnavailableError } from "../src/errors.js";
import { decide, routeQuery } from "../src/rag/router.js";
import type { CorpusScorer } from "../src/rag/scorers.js";
import { createCentroidScorer, createLlmScorer, createNearestChunkScorer, parseRating } from "../src/rag/scorers.js";
import type { CorpusSource, Persona, RouterSettings } from "../src/rag/types.js";
import type { SearchableCorpus } from "../src/corpus/types.js";
import { captureLogger, createScriptedChat, makeIndex, vocabVector } from "./helpers.js";

const persona: Persona = { role: "Developer", preferences: "Concise", activity: "Troubleshooting" };
const settings: RouterSettings = { confidenceFloor: 0.35, tieEpsilon: 1e-6, priority: ["docs", "tickets", "configs"] };

function sourceOf(indexes: Record<string, SearchableCorpus | undefined>): CorpusSource {
  return {
    corpora: Object.keys(indexes),
    get(corpus) {
      const index = indexes[corpus];
      if (!index) throw new IndexUnavailableError({ corpus, reason: "missing" });
      return index;
    }
  };
}

const corpora = sourceOf({
  docs: makeIndex("docs", ["redeploy staging with the deploy pipeline", "espresso coffee"]),
  tickets: makeIndex("tickets", ["login timeout bug ticket"]),
  configs: makeIndex("configs", ["database replicas yaml config"])
});

async function route(query: string, opts: { source?: CorpusSource; scorer?: CorpusScorer; settings?: RouterSettings } = {}) {
  return await routeQuery({
    query,
    queryEmbedding: vocabVector(query),
    persona,
    corpora: opts.source ?? corpora,
    scorer: opts.scorer ?? createNearestChunkScorer(),
    settings: opts.settings ?? settings
  });
}

describe("decide", () => {
  test("highest score above the floor wins", () => {
    const d = decide(
      [
        { corpus: "docs", score: 0.4 },
        { corpus: "tickets", score: 0.9 }
      ],
      [],
      settings
    );
    expect(d).toMatchObject({ kind: "corpus", corpus: "tickets", confidence: 0.9 });
  });

  test("near-ties go to the earlier corpus in the priority order", () => {
    const d = decide(
      [
        { corpus: "configs", score: 0.8 + 5e-7 },
        { corpus: "tickets", score: 0.8 }
      ],
      [],
      settings
    );
    expect(d).toMatchObject({ kind: "corpus", corpus: "tickets" });

    const reordered = decide(
      [
        { corpus: "configs", score: 0.8 },
        { corpus: "tickets", score: 0.8 }
      ],
      [],
      { ...settings, priority: ["configs", "tickets", "docs"] }
    );
    expect(reordered).toMatchObject({ kind: "corpus", corpus: "configs" });
  });

  test("a score equal to the floor is not enough", () => {
    const d = decide([{ corpus: "docs", score: 0.35 }], [], settings);
    expect(d).toEqual({ kind: "fallback", reason: "below_floor", confidence: 0.35, scores: [{ corpus: "docs", score: 0.35 }], skipped: [] });
  });

  test("no scored corpus means fallback without confidence", () => {
    const skipped = [{ corpus: "docs", errorKind: "index_unavailable:missing", message: "gone" }];
    expect(decide([], skipped, settings)).toEqual({ kind: "fallback", reason: "no_corpora", confidence: null, scores: [], skipped });
  });
});

describe("routeQuery", () => {
  test("routes a deployment question to docs", async () => {
    const d = await route("How do I redeploy staging?");
    expect(d.kind).toBe("corpus");
    if (d.kind !== "corpus") return;
    expect(d.corpus).toBe("docs");
    expect(d.confidence).toBeCloseTo(2 / Math.sqrt(2 * 4));
    expect(d.scores.map((s) => s.corpus)).toEqual(["docs", "tickets", "configs"]);
  });

  test("unrelated input falls back below the floor, the same way every time", async () => {
    const first = await route("zxqv blorp");
    const second = await route("zxqv blorp");
    expect(first).toEqual({
      kind: "fallback",
      reason: "below_floor",
      confidence: 0,
      scores: [
        { corpus: "docs", score: 0 },
        { corpus: "tickets", score: 0 },
        { corpus: "configs", score: 0 }
      ],
      skipped: []
    });
    expect(second).toEqual(first);
  });

  test("skips unavailable corpora and still routes among the rest", async () => {
    const source = sourceOf({ docs: undefined, tickets: makeIndex("tickets", ["login timeout bug ticket"]) });
    const { logger, records } = captureLogger();
    const d = await routeQuery({
      query: "login timeout",
      queryEmbedding: vocabVector("login timeout"),
      persona,
      corpora: source,
      scorer: createNearestChunkScorer(),
      settings,
      logger
    });
    expect(d).toMatchObject({ kind: "corpus", corpus: "tickets" });
    expect(d.skipped).toHaveLength(1);
    expect(d.skipped[0]).toMatchObject({ corpus: "docs", errorKind: "index_unavailable:missing" });
    expect(d.skipped[0]!.message).toContain('corpus "docs"');
    expect(records.filter((r) => r.event === "router.corpus.skipped").map((r) => r.corpus)).toEqual(["docs"]);
  });

  test("no available corpus yields no_corpora", async () => {
    const d = await route("redeploy staging", { source: sourceOf({ docs: undefined }) });
    expect(d).toMatchObject({ kind: "fallback", reason: "no_corpora", confidence: null });
  });

  test("with the fail policy, every index missing rejects with the first corpus in priority order", async () => {
    const failing: RouterSettings = { ...settings, onUnavailable: "fail" };
    const { logger, records } = captureLogger();
    const attempt = routeQuery({
      query: "redeploy staging",
      queryEmbedding: vocabVector("redeploy staging"),
      persona,
      corpora: sourceOf({ tickets: undefined, docs: undefined }),
      scorer: createNearestChunkScorer(),
      settings: failing,
      logger
    });
    await expect(attempt).rejects.toBeInstanceOf(IndexUnavailableError);
    await expect(attempt).rejects.toMatchObject({ corpus: "docs", reason: "missing" });
    expect(records.find((r) => r.event === "router.all_unavailable")).toMatchObject({ corpora: ["docs", "tickets"] });
  });

  test("with the fail policy, one reachable index is enough to route", async () => {
    const source = sourceOf({ docs: undefined, tickets: makeIndex("tickets", ["login timeout bug ticket"]) });
    const d = await route("login timeout", { source, settings: { ...settings, onUnavailable: "fail" } });
    expect(d).toMatchObject({ kind: "corpus", corpus: "tickets" });
  });

  test("with the fail policy, scorer errors still fall back", async () => {
    const scorer: CorpusScorer = {
      name: "broken",
      async score() {
        throw new Error("scorer exploded");
      }
    };
    const d = await route("redeploy staging", { scorer, settings: { ...settings, onUnavailable: "fail" } });
    expect(d).toMatchObject({ kind: "fallback", reason: "no_corpora", confidence: null });
  });

  test("a failing or non-finite scorer result skips that corpus instead of throwing", async () => {
    const scorer: CorpusScorer = {
      name: "flaky",
      async score({ corpus }) {
        if (corpus.info.corpus === "docs") throw new Error("scorer exploded");
        if (corpus.info.corpus === "tickets") return Number.NaN;
        return 0.9;
      }
    };
    const d = await route("anything", { scorer });
    expect(d).toMatchObject({ kind: "corpus", corpus: "configs", confidence: 0.9 });
    expect(d.skipped.map((s) => [s.corpus, s.errorKind])).toEqual([
      ["docs", "Error"],
      ["tickets", "invalid_score"]
    ]);
  });

  test("centroid scorer compares against the corpus mean", async () => {
    const d = await route("database replicas yaml config", { scorer: createCentroidScorer() });
    expect(d).toMatchObject({ kind: "corpus", corpus: "configs" });
    expect(d.kind === "corpus" ? d.confidence : 0).toBeCloseTo(1);
  });
});

describe("llm scorer", () => {
  test("parses a JSON rating per corpus and routes on it", async () => {
    const chat = createScriptedChat((messages) => {
      const prompt = messages[1]?.content ?? "";
      if (prompt.includes("Source: tickets")) return 'Sure: {"score": 0.82}';
      if (prompt.includes("Source: docs")) return '{"score": 0.4}';
      return "no idea";
    });
    const d = await route("which tickets are open?", { scorer: createLlmScorer(chat) });
    expect(d).toMatchObject({ kind: "corpus", corpus: "tickets", confidence: 0.82 });
    expect(d.scores).toEqual([
      { corpus: "docs", score: 0.4 },
      { corpus: "tickets", score: 0.82 },
      { corpus: "configs", score: 0 }
    ]);
    expect(chat.calls).toHaveLength(3);
    expect(chat.calls[0]![1]!.content).toContain("Asker role: Developer");
  });

  test("parseRating tolerates junk", () => {
    expect(parseRating('{"score": 0.5}')).toBe(0.5);
    expect(parseRating('{"score": 7}')).toBe(0);
    expect(parseRating("{broken")).toBe(0);
    expect(parseRating("")).toBe(0);
  });
});
