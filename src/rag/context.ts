import type { ScoredChunk } from "../corpus/types.js";
import { IsolationViolationError, errorKind } from "../errors.js";
import type { ScoredTurn } from "../memory/types.js";
import type { Logger } from "../util/log.js";
import type { CorpusSource, Evidence, MemorySearcher, RoutingDecision } from "./types.js";

/** Smallest budget that always fits one clipped item per segment plus labels. */
export const MIN_CONTEXT_BUDGET_TOKENS = 32;

export function estimateTokens(text: string): number {
  return text.split(/\s+/g).filter(Boolean).length;
}

export async function gatherEvidence(input: {
  decision: RoutingDecision;
  queryEmbedding: Float32Array;
  userId: string;
  corpora: CorpusSource;
  memory: MemorySearcher;
  topKFor: (corpus: string) => number;
  history: { limit: number; window: number; minScore: number };
  logger: Logger;
}): Promise<Evidence> {
  let decision = input.decision;
  let knowledge: ScoredChunk[] = [];

  if (decision.kind === "corpus") {
    const corpus = decision.corpus;
    try {
      knowledge = input.corpora.get(corpus).search(input.queryEmbedding, input.topKFor(corpus));
    } catch (err) {
      input.logger.warn("retrieval.failed", { corpus, errorKind: errorKind(err), error: err });
      decision = {
        kind: "fallback",
        reason: "retrieval_failed",
        confidence: decision.confidence,
        scores: decision.scores,
        skipped: decision.skipped,
        degradedFrom: corpus
      };
    }
  }

  let history: ScoredTurn[] = [];
  try {
    history = input.memory.searchByUser(input.userId, input.queryEmbedding, input.history.limit, {
      limitTurns: input.history.window,
      minScore: input.history.minScore
    });
  } catch (err) {
    if (err instanceof IsolationViolationError) throw err;
    input.logger.warn("history.unavailable", { errorKind: errorKind(err), error: err });
  }

  return { decision, knowledge, history };
}

export type AssembledContext = {
  text: string;
  tokens: number;
  budgetTokens: number;
  knowledge: ScoredChunk[];
  history: ScoredTurn[];
  dropped: { knowledge: number; history: number };
  clippedItems: number;
};

type Segment = "knowledge" | "history";

type Entry = {
  score: number;
  /** Whitespace tokens of the rendered item label. */
  labelTokens: number;
  words: string[];
  text: string;
  clipped: boolean;
};

/**
 * Renders KNOWLEDGE then HISTORY within `budgetTokens` whitespace tokens.
 *
 * Over budget, the lowest-scored item is dropped from a segment that still
 * holds more than one item. When none does, the longest remaining item is
 * clipped word by word. A segment that had items keeps at least one.
 */
export function assembleContext(input: {
  knowledge: ScoredChunk[];
  history: ScoredTurn[];
  budgetTokens: number;
  corpus?: string;
}): AssembledContext {
  if (!Number.isInteger(input.budgetTokens) || input.budgetTokens < MIN_CONTEXT_BUDGET_TOKENS) {
    throw new RangeError(`Context budget must be an integer >= ${MIN_CONTEXT_BUDGET_TOKENS}, got ${input.budgetTokens}`);
  }

  const knowledge = [...input.knowledge]
    .sort((a, b) => b.score - a.score || a.chunk.id - b.chunk.id)
    .map((k) => ({ source: k, entry: toEntry(k.score, knowledgeLabel(k, 1), k.chunk.text) }));
  const history = [...input.history]
    .sort((a, b) => b.score - a.score || b.turn.timestamp.getTime() - a.turn.timestamp.getTime())
    .map((h) => ({ source: h, entry: toEntry(h.score, historyLabel(h, 1), h.turn.text) }));

  const knowledgeTitle = input.corpus ? `KNOWLEDGE (${input.corpus}):` : "KNOWLEDGE:";
  const fixed =
    estimateTokens(knowledgeTitle) + (knowledge.length === 0 ? 1 : 0) + estimateTokens("HISTORY:") + (history.length === 0 ? 1 : 0);
  const cost = (e: Entry) => e.labelTokens + e.words.length;

  let total = fixed + [...knowledge, ...history].reduce((sum, x) => sum + cost(x.entry), 0);
  const dropped = { knowledge: 0, history: 0 };
  let clippedItems = 0;

  while (total > input.budgetTokens) {
    const segments: { name: Segment; items: { entry: Entry }[] }[] = [
      { name: "history", items: history },
      { name: "knowledge", items: knowledge }
    ];
    const droppable = segments.filter((s) => s.items.length > 1);

    if (droppable.length > 0) {
      let target = droppable[0];
      for (const s of droppable) {
        const last = s.items[s.items.length - 1];
        const current = target?.items[target.items.length - 1];
        if (last && current && last.entry.score < current.entry.score) target = s;
      }
      const removed = target?.items.pop();
      if (!target || !removed) break;
      dropped[target.name] += 1;
      total -= cost(removed.entry);
      continue;
    }

    let longest: Entry | undefined;
    for (const x of [...knowledge, ...history]) {
      if (x.entry.words.length > 1 && (!longest || x.entry.words.length > longest.words.length)) longest = x.entry;
    }
    if (!longest) {
      throw new RangeError(`Context labels alone exceed the budget of ${input.budgetTokens} tokens`);
    }
    const keep = Math.max(1, longest.words.length - (total - input.budgetTokens));
    total -= longest.words.length - keep;
    if (!longest.clipped) clippedItems += 1;
    longest.words = longest.words.slice(0, keep);
    longest.text = `${longest.words.join(" ")}…`;
    longest.clipped = true;
  }

  const lines: string[] = [knowledgeTitle];
  if (knowledge.length === 0) lines.push("(none)");
  knowledge.forEach((k, i) => {
    lines.push(knowledgeLabel(k.source, i + 1));
    lines.push(k.entry.text);
  });

  lines.push("");
  lines.push("HISTORY:");
  if (history.length === 0) lines.push("(none)");
  const chronological = [...history].sort((a, b) => a.source.turn.timestamp.getTime() - b.source.turn.timestamp.getTime());
  chronological.forEach((h, i) => {
    lines.push(`${historyLabel(h.source, i + 1)} ${h.entry.text}`);
  });

  const text = lines.join("\n");
  return {
    text,
    tokens: estimateTokens(text),
    budgetTokens: input.budgetTokens,
    knowledge: knowledge.map((k) => k.source),
    history: chronological.map((h) => h.source),
    dropped,
    clippedItems
  };
}

function toEntry(score: number, label: string, text: string): Entry {
  return { score, labelTokens: estimateTokens(label), words: text.split(/\s+/g).filter(Boolean), text, clipped: false };
}

function knowledgeLabel(k: ScoredChunk, n: number): string {
  const meta = k.chunk.metadata;
  const raw = meta.file ?? meta.id ?? meta.name ?? `chunk-${k.chunk.id}`;
  const source = String(raw).replace(/\s+/g, "_") || `chunk-${k.chunk.id}`;
  return `[K${n}] ${source} (score ${k.score.toFixed(3)})`;
}

function historyLabel(h: ScoredTurn, n: number): string {
  return `[H${n}] ${h.turn.role}:`;
}
