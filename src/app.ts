import type { AppConfig, RouterStrategy } from "./config.js";
import { CORPORA } from "./config.js";
import { CorpusRegistry } from "./corpus/registry.js";
import { openDb } from "./db/db.js";
import type { Db } from "./db/db.js";
import { embeddingCacheMigrations } from "./db/migrations.js";
import { ChatMemoryStore } from "./memory/chatMemoryStore.js";
import { MemoryWriter } from "./memory/memoryWriter.js";
import type { MemorySink } from "./memory/sinks.js";
import { auditLogSink, vectorMemorySink } from "./memory/sinks.js";
import { createCachedEmbeddingsClient } from "./providers/cachedEmbeddings.js";
import { createHashingEmbeddingsClient } from "./providers/hashing.js";
import { createOpenAICompatChatClient, createOpenAICompatEmbeddingsClient } from "./providers/openaiCompat.js";
import type { ChatClient, EmbeddingsClient } from "./providers/types.js";
import type { PipelineDeps, PipelineSettings } from "./rag/pipeline.js";
import type { CorpusScorer } from "./rag/scorers.js";
import { createCentroidScorer, createLlmScorer, createNearestChunkScorer } from "./rag/scorers.js";
import type { Logger, LogSink } from "./util/log.js";
import { consoleSink, createLogger, jsonlFileSink } from "./util/log.js";

export function createAppLogger(cfg: AppConfig): Logger {
  const sinks: LogSink[] = [consoleSink];
  if (cfg.requestLogPath) sinks.push(jsonlFileSink(cfg.requestLogPath));
  return createLogger({ level: cfg.logLevel, sinks, bindings: { service: "kb-router" } });
}

/** Provider client wrapped in the on-disk cache when `cacheDb` is given. */
export function createEmbedder(cfg: AppConfig, cacheDb?: Db): EmbeddingsClient {
  const inner =
    cfg.embeddings.provider === "hashing"
      ? createHashingEmbeddingsClient({ dims: cfg.embeddings.dims })
      : createOpenAICompatEmbeddingsClient({
          provider: "openai",
          baseUrl: cfg.embeddings.baseUrl,
          apiKey: cfg.embeddings.apiKey,
          model: cfg.embeddings.model,
          dimensions: cfg.embeddings.requestDimensions,
          modelVersion: cfg.embeddings.modelVersion,
          timeoutMs: cfg.embeddings.timeoutMs
        });
  return cacheDb ? createCachedEmbeddingsClient(cacheDb, inner) : inner;
}

export function createChatClient(cfg: AppConfig): ChatClient {
  return createOpenAICompatChatClient({
    provider: "openai",
    baseUrl: cfg.llm.baseUrl,
    apiKey: cfg.llm.apiKey,
    model: cfg.llm.model,
    timeoutMs: cfg.llm.timeoutMs
  });
}

export function createScorer(strategy: RouterStrategy, chat: ChatClient): CorpusScorer {
  switch (strategy) {
    case "nearest":
      return createNearestChunkScorer();
    case "centroid":
      return createCentroidScorer();
    case "llm":
      return createLlmScorer(chat);
  }
}

export function pipelineSettings(cfg: AppConfig): PipelineSettings {
  const byCorpus: Partial<Record<string, number>> = cfg.retrieval.topKByCorpus;
  return {
    router: {
      confidenceFloor: cfg.router.confidenceFloor,
      tieEpsilon: cfg.router.tieEpsilon,
      priority: cfg.router.priority,
      onUnavailable: cfg.router.onUnavailable
    },
    topKFor: (corpus) => byCorpus[corpus] ?? cfg.retrieval.topK,
    history: {
      limit: cfg.retrieval.chatHistoryLimit,
      window: cfg.retrieval.chatHistoryWindow,
      minScore: cfg.retrieval.chatHistoryMinScore
    },
    contextBudgetTokens: cfg.contextBudgetTokens,
    deadlineMs: cfg.pipelineDeadlineMs,
    persona: { ...cfg.persona },
    temperature: cfg.llm.temperature
  };
}

export type App = {
  config: AppConfig;
  logger: Logger;
  embedder: EmbeddingsClient;
  chat: ChatClient;
  registry: CorpusRegistry;
  memory: ChatMemoryStore;
  writer: MemoryWriter;
  deps: PipelineDeps;
  /** Waits for pending memory writes, then closes every database handle. */
  close(): Promise<void>;
};

/** Wires every long-lived component from configuration. Loading corpora never throws. */
export function createApp(cfg: AppConfig, overrides: { logger?: Logger; embedder?: EmbeddingsClient; chat?: ChatClient } = {}): App {
  const logger = overrides.logger ?? createAppLogger(cfg);
  const cacheDb = overrides.embedder ? undefined : openDb(cfg.embedCachePath, { migrations: embeddingCacheMigrations });
  const embedder = overrides.embedder ?? createEmbedder(cfg, cacheDb);
  const chat = overrides.chat ?? createChatClient(cfg);

  const registry = new CorpusRegistry({ indexDir: cfg.indexDir, corpora: CORPORA, fingerprint: embedder.fingerprint, logger });
  registry.loadAll();

  let memory: ChatMemoryStore;
  try {
    memory = ChatMemoryStore.open(cfg.memoryDbPath, embedder, { logger });
  } catch (err) {
    cacheDb?.close();
    throw err;
  }

  const sinks: MemorySink[] = [vectorMemorySink(memory)];
  if (cfg.auditLogPath) sinks.push(auditLogSink(cfg.auditLogPath));
  const writer = new MemoryWriter(sinks, { logger });

  const deps: PipelineDeps = {
    embedder,
    chat,
    corpora: registry,
    memory,
    writer,
    scorer: createScorer(cfg.router.strategy, chat),
    settings: pipelineSettings(cfg),
    logger
  };

  return {
    config: cfg,
    logger,
    embedder,
    chat,
    registry,
    memory,
    writer,
    deps,
    async close() {
      await writer.flush();
      memory.close();
      cacheDb?.close();
    }
  };
}
