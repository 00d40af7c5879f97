import type { ScoredChunk, SearchableCorpus } from "../corpus/types.js";
import type { MemorySearchOptions, ScoredTurn } from "../memory/types.js";
import type { Logger } from "../util/log.js";

export type Persona = {
  role: string;
  preferences: string;
  activity: string;
};

export type CorpusScore = { corpus: string; score: number };

export type SkippedCorpus = { corpus: string; errorKind: string; message: string };

export type FallbackReason = "below_floor" | "no_corpora" | "retrieval_failed" | "embedding_failed";

/** What routing does when no corpus index can be loaded at all. */
export type UnavailablePolicy = "fallback" | "fail";

/** Exactly one corpus or the fallback path; carries every score that was computed. */
export type RoutingDecision =
  | {
      kind: "corpus";
      corpus: string;
      confidence: number;
      scores: CorpusScore[];
      skipped: SkippedCorpus[];
    }
  | {
      kind: "fallback";
      reason: FallbackReason;
      /** Best score seen, if any corpus could be scored. */
      confidence: number | null;
      scores: CorpusScore[];
      skipped: SkippedCorpus[];
      /** Set when retrieval on the selected corpus failed and the route degraded. */
      degradedFrom?: string;
    };

/** The corpora a request may route to. CorpusRegistry satisfies it. */
export interface CorpusSource {
  readonly corpora: readonly string[];
  get(corpus: string): SearchableCorpus;
}

export interface MemorySearcher {
  searchByUser(userId: string, queryEmbedding: Float32Array, k: number, opts?: MemorySearchOptions): ScoredTurn[];
}

/** Passed explicitly through every stage of one request. */
export type RequestContext = {
  requestId: string;
  userId: string;
  sessionId: string;
  logger: Logger;
  signal?: AbortSignal;
};

export type Evidence = {
  decision: RoutingDecision;
  knowledge: ScoredChunk[];
  history: ScoredTurn[];
};

export type RouterSettings = {
  confidenceFloor: number;
  tieEpsilon: number;
  /** Fixed order used to break near-ties; corpora not listed rank after those listed. */
  priority: readonly string[];
  /** Defaults to "fallback". Under "fail", routing throws the first IndexUnavailableError. */
  onUnavailable?: UnavailablePolicy;
};
