export * from "./errors.js";
export { getConfig, CORPORA } from "./config.js";
export type { AppConfig, CorpusName, RouterStrategy } from "./config.js";
export { createApp, createEmbedder, createChatClient, createScorer, pipelineSettings } from "./app.js";
export type { App } from "./app.js";

export { CorpusIndex } from "./corpus/corpusIndex.js";
export { buildCorpusIndex, buildCorpusFromSource } from "./corpus/buildIndex.js";
export { CorpusRegistry, artifactPathFor } from "./corpus/registry.js";
export type { Chunk, ChunkInput, ScoredChunk, IndexInfo, SearchableCorpus } from "./corpus/types.js";

export { ChatMemoryStore } from "./memory/chatMemoryStore.js";
export { MemoryWriter } from "./memory/memoryWriter.js";
export { vectorMemorySink, auditLogSink, readAuditLog } from "./memory/sinks.js";
export type { MemorySink, CompletedTurn } from "./memory/sinks.js";
export type { ChatTurn, ScoredTurn, PrunePolicy } from "./memory/types.js";

export { createHashingEmbeddingsClient } from "./providers/hashing.js";
export { createOpenAICompatChatClient, createOpenAICompatEmbeddingsClient } from "./providers/openaiCompat.js";
export type { ChatClient, EmbeddingsClient } from "./providers/types.js";

export { routeQuery, decide } from "./rag/router.js";
export { createNearestChunkScorer, createCentroidScorer, createLlmScorer } from "./rag/scorers.js";
export type { CorpusScorer } from "./rag/scorers.js";
export { assembleContext, gatherEvidence, estimateTokens } from "./rag/context.js";
export { generateAnswer } from "./rag/generate.js";
export { runQuery, ChatRequestSchema } from "./rag/pipeline.js";
export type { ChatRequest, PipelineDeps, QueryResult } from "./rag/pipeline.js";
export type { Persona, RoutingDecision, RequestContext } from "./rag/types.js";
