import crypto from "node:crypto";
import { z } from "zod";

import { EmbeddingFailureError, RequestValidationError, errorKind, errorMessage } from "../errors.js";
import type { MemoryWriter } from "../memory/memoryWriter.js";
import { embedWithRetry } from "../providers/retry.js";
import type { ChatClient, EmbeddingsClient, Usage } from "../providers/types.js";
import type { Logger } from "../util/log.js";
import { sanitizeForLog } from "../util/log.js";
import type { Deadline, TimerResult } from "../util/timing.js";
import { createDeadline, timeIt, withDeadline } from "../util/timing.js";
import { assembleContext, gatherEvidence } from "./context.js";
import type { AssembledContext } from "./context.js";
import { generateAnswer } from "./generate.js";
import type { PromptTemplate } from "./prompts.js";
import { routeQuery } from "./router.js";
import type { CorpusScorer } from "./scorers.js";
import type { CorpusSource, Evidence, MemorySearcher, Persona, RequestContext, RouterSettings, RoutingDecision } from "./types.js";

export const ChatRequestSchema = z.object({
  user_query: z.string().trim().min(1, "user_query cannot be empty").max(1000),
  user_id: z.string().trim().min(1).max(50).default("anonymous"),
  session_id: z.string().trim().min(1).max(36).optional(),
  user_role: z.string().trim().min(1).max(200).optional(),
  user_preferences: z.string().trim().min(1).max(500).optional(),
  user_activity: z.string().trim().min(1).max(500).optional()
});

export type ChatRequest = z.input<typeof ChatRequestSchema>;

export type PipelineSettings = {
  router: RouterSettings;
  topKFor: (corpus: string) => number;
  history: { limit: number; window: number; minScore: number };
  contextBudgetTokens: number;
  deadlineMs: number;
  persona: Persona;
  temperature?: number;
  embedRetryDelayMs?: number;
};

export type PipelineDeps = {
  embedder: EmbeddingsClient;
  chat: ChatClient;
  corpora: CorpusSource;
  memory: MemorySearcher;
  writer: MemoryWriter;
  scorer: CorpusScorer;
  settings: PipelineSettings;
  logger: Logger;
};

export type QueryResult = {
  requestId: string;
  userId: string;
  sessionId: string;
  answer: string;
  template: PromptTemplate;
  decision: RoutingDecision;
  retrieval: {
    knowledge: number;
    history: number;
    contextTokens: number;
    dropped: AssembledContext["dropped"];
    clippedItems: number;
  };
  timings: TimerResult[];
  usage?: Usage;
};

export type RunQueryOptions = {
  signal?: AbortSignal;
  deadlineMs?: number;
  requestId?: string;
  now?: Date;
};

/**
 * Validate, embed, route, assemble, generate. The memory write is scheduled
 * after the result is ready and never affects it.
 *
 * Failing to embed the query, or to reach the routed corpus, degrades to the
 * fallback template. Generation failures, timeouts, invalid requests and (under
 * the "fail" policy) every index being unavailable reject.
 */
export async function runQuery(deps: PipelineDeps, request: ChatRequest, opts: RunQueryOptions = {}): Promise<QueryResult> {
  const requestId = opts.requestId ?? crypto.randomUUID();
  const parsed = ChatRequestSchema.safeParse(request);
  if (!parsed.success) {
    const err = new RequestValidationError(parsed.error.issues);
    deps.logger.warn("request.failed", { requestId, errorKind: errorKind(err), error: err.message });
    throw err;
  }

  const req = parsed.data;
  const ctx: RequestContext = {
    requestId,
    userId: req.user_id,
    sessionId: req.session_id ?? crypto.randomUUID(),
    logger: deps.logger.child({ requestId, userId: sanitizeForLog(req.user_id, 50) }),
    signal: opts.signal
  };
  const persona: Persona = {
    role: req.user_role ?? deps.settings.persona.role,
    preferences: req.user_preferences ?? deps.settings.persona.preferences,
    activity: req.user_activity ?? deps.settings.persona.activity
  };

  const deadline = createDeadline(opts.deadlineMs ?? deps.settings.deadlineMs, opts.signal);
  const timings: TimerResult[] = [];
  let decision: RoutingDecision | undefined;

  try {
    const embedTimed = await timeIt("embed.query", () => embedQuery(deps, req.user_query, deadline, ctx.logger));
    timings.push(embedTimed.timing);
    const queryEmbedding = embedTimed.value;

    let evidence: Evidence;
    if (queryEmbedding === null) {
      // No vector to search with: neither corpora nor memory can be consulted.
      decision = { kind: "fallback", reason: "embedding_failed", confidence: null, scores: [], skipped: [] };
      evidence = { decision, knowledge: [], history: [] };
    } else {
      const routeTimed = await timeIt("route", () =>
        withDeadline(deadline, () =>
          routeQuery({
            query: req.user_query,
            queryEmbedding,
            persona,
            corpora: deps.corpora,
            scorer: deps.scorer,
            settings: deps.settings.router,
            logger: ctx.logger,
            signal: deadline.signal
          })
        )
      );
      timings.push(routeTimed.timing);
      const routed = routeTimed.value;
      decision = routed;

      const retrieveTimed = await timeIt("retrieve", () =>
        withDeadline(deadline, () =>
          gatherEvidence({
            decision: routed,
            queryEmbedding,
            userId: ctx.userId,
            corpora: deps.corpora,
            memory: deps.memory,
            topKFor: deps.settings.topKFor,
            history: deps.settings.history,
            logger: ctx.logger
          })
        )
      );
      timings.push(retrieveTimed.timing);
      evidence = retrieveTimed.value;
      decision = evidence.decision;
    }

    const context = assembleContext({
      knowledge: evidence.knowledge,
      history: evidence.history,
      budgetTokens: deps.settings.contextBudgetTokens,
      corpus: evidence.decision.kind === "corpus" ? evidence.decision.corpus : undefined
    });
    const template: PromptTemplate = evidence.decision.kind === "corpus" ? "grounded" : "fallback";

    const genTimed = await timeIt("generate", () =>
      withDeadline(deadline, () =>
        generateAnswer({
          chat: deps.chat,
          template,
          persona,
          context,
          query: req.user_query,
          temperature: deps.settings.temperature,
          signal: deadline.signal
        })
      )
    );
    timings.push(genTimed.timing);
    deadline.check();

    const result: QueryResult = {
      requestId,
      userId: ctx.userId,
      sessionId: ctx.sessionId,
      answer: genTimed.value.text,
      template,
      decision: evidence.decision,
      retrieval: {
        knowledge: context.knowledge.length,
        history: context.history.length,
        contextTokens: context.tokens,
        dropped: context.dropped,
        clippedItems: context.clippedItems
      },
      timings,
      usage: genTimed.value.usage
    };

    ctx.logger.info("request.completed", {
      ...routeFields(evidence.decision),
      sessionId: ctx.sessionId,
      knowledgeCount: result.retrieval.knowledge,
      historyCount: result.retrieval.history,
      contextTokens: context.tokens,
      timings,
      query: sanitizeForLog(req.user_query, 500),
      answer: sanitizeForLog(result.answer, 500)
    });

    deps.writer.schedule(
      { requestId, userId: ctx.userId, sessionId: ctx.sessionId, query: req.user_query, answer: result.answer, now: opts.now },
      ctx.logger
    );
    return result;
  } catch (err) {
    ctx.logger.error("request.failed", {
      ...(decision ? routeFields(decision) : {}),
      sessionId: ctx.sessionId,
      timings,
      query: sanitizeForLog(req.user_query, 500),
      errorKind: errorKind(err),
      error: errorMessage(err)
    });
    throw err;
  } finally {
    deadline.dispose();
  }
}

/**
 * The query vector, or null once embedding has failed after its retry. A
 * deadline that fired meanwhile still surfaces as a timeout.
 */
async function embedQuery(deps: PipelineDeps, text: string, deadline: Deadline, logger: Logger): Promise<Float32Array | null> {
  try {
    return await withDeadline(deadline, () =>
      embedWithRetry(deps.embedder, text, {
        signal: deadline.signal,
        retryDelayMs: deps.settings.embedRetryDelayMs,
        onRetry: (err) => logger.warn("embed.query.retry", { error: err.message })
      })
    );
  } catch (err) {
    deadline.check();
    if (!(err instanceof EmbeddingFailureError)) throw err;
    logger.warn("embed.query.failed", { errorKind: errorKind(err), error: err.message });
    return null;
  }
}

function routeFields(decision: RoutingDecision): Record<string, unknown> {
  return {
    route: decision.kind,
    corpus: decision.kind === "corpus" ? decision.corpus : null,
    fallback: decision.kind === "fallback",
    fallbackReason: decision.kind === "fallback" ? decision.reason : null,
    confidence: decision.confidence,
    scores: decision.scores,
    skipped: decision.skipped.map((s) => ({ corpus: s.corpus, errorKind: s.errorKind }))
  };
}
