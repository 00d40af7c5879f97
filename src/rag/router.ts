import { IndexUnavailableError, errorKind, errorMessage } from "../errors.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import type { CorpusScorer } from "./scorers.js";
import type { CorpusScore, CorpusSource, Persona, RouterSettings, RoutingDecision, SkippedCorpus } from "./types.js";

export type RouteInput = {
  query: string;
  queryEmbedding: Float32Array;
  persona: Persona;
  corpora: CorpusSource;
  scorer: CorpusScorer;
  settings: RouterSettings;
  logger?: Logger;
  signal?: AbortSignal;
};

/**
 * Scores every corpus independently and selects one, or FALLBACK.
 *
 * The best score must be strictly above the confidence floor. Scores within
 * `tieEpsilon` of the best are settled by `priority`. Corpora that cannot be
 * loaded or scored are skipped. The only routing reason to throw is every
 * configured index being unavailable while `onUnavailable` is "fail".
 */
export async function routeQuery(input: RouteInput): Promise<RoutingDecision> {
  const logger = input.logger ?? silentLogger;
  const order = evaluationOrder(input.corpora.corpora, input.settings.priority);

  const outcomes = await Promise.all(
    order.map(async (corpus): Promise<CorpusScore | { skip: SkippedCorpus; error: unknown }> => {
      try {
        const index = input.corpora.get(corpus);
        const score = await input.scorer.score({
          query: input.query,
          queryEmbedding: input.queryEmbedding,
          persona: input.persona,
          corpus: index,
          signal: input.signal
        });
        if (!Number.isFinite(score)) {
          return { skip: { corpus, errorKind: "invalid_score", message: `scorer ${input.scorer.name} returned ${score}` }, error: null };
        }
        return { corpus, score };
      } catch (err) {
        logger.warn("router.corpus.skipped", { corpus, errorKind: errorKind(err), error: err });
        return { skip: { corpus, errorKind: errorKind(err), message: errorMessage(err) }, error: err };
      }
    })
  );

  const scores: CorpusScore[] = [];
  const skipped: SkippedCorpus[] = [];
  const unavailable: IndexUnavailableError[] = [];
  for (const o of outcomes) {
    if ("score" in o) {
      scores.push(o);
      continue;
    }
    skipped.push(o.skip);
    if (o.error instanceof IndexUnavailableError) unavailable.push(o.error);
  }

  const [firstUnavailable] = unavailable;
  if (input.settings.onUnavailable === "fail" && firstUnavailable && unavailable.length === outcomes.length) {
    logger.error("router.all_unavailable", { corpora: unavailable.map((e) => e.corpus) });
    throw firstUnavailable;
  }

  return decide(scores, skipped, input.settings);
}

/** Pure selection step over precomputed scores, in evaluation order. */
export function decide(scores: CorpusScore[], skipped: SkippedCorpus[], settings: RouterSettings): RoutingDecision {
  if (scores.length === 0) {
    return { kind: "fallback", reason: "no_corpora", confidence: null, scores, skipped };
  }

  const best = Math.max(...scores.map((s) => s.score));
  if (!(best > settings.confidenceFloor)) {
    return { kind: "fallback", reason: "below_floor", confidence: best, scores, skipped };
  }

  const rank = (corpus: string) => {
    const idx = settings.priority.indexOf(corpus);
    return idx === -1 ? settings.priority.length : idx;
  };
  const contenders = scores
    .filter((s) => s.score > settings.confidenceFloor && best - s.score <= settings.tieEpsilon)
    .sort((a, b) => rank(a.corpus) - rank(b.corpus) || a.corpus.localeCompare(b.corpus));
  const winner = contenders[0];
  if (!winner) {
    return { kind: "fallback", reason: "below_floor", confidence: best, scores, skipped };
  }
  return { kind: "corpus", corpus: winner.corpus, confidence: winner.score, scores, skipped };
}

function evaluationOrder(corpora: readonly string[], priority: readonly string[]): string[] {
  const listed = priority.filter((c) => corpora.includes(c));
  const rest = corpora.filter((c) => !priority.includes(c));
  return [...listed, ...rest];
}
