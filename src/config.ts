import "dotenv/config";

import path from "node:path";
import { z } from "zod";

import { ConfigError } from "./errors.js";

export const CORPORA = ["docs", "tickets", "configs"] as const;
export type CorpusName = (typeof CORPORA)[number];
export const CorpusNameSchema = z.enum(CORPORA);

export const RouterStrategySchema = z.enum(["nearest", "centroid", "llm"]);
export type RouterStrategy = z.infer<typeof RouterStrategySchema>;

export const UnavailablePolicySchema = z.enum(["fallback", "fail"]);

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const AppConfigSchema = z.object({
  dataDir: z.string().min(1),
  indexDir: z.string().min(1),
  memoryDbPath: z.string().min(1),
  embedCachePath: z.string().min(1),
  auditLogPath: z.string().optional(),
  requestLogPath: z.string().optional(),
  logLevel: LogLevelSchema,
  embeddings: z.object({
    provider: z.enum(["hashing", "openai"]),
    baseUrl: z.string().url(),
    apiKey: z.string().optional(),
    model: z.string().min(1),
    dims: z.number().int().min(8).max(8192),
    requestDimensions: z.number().int().min(1).max(8192).optional(),
    modelVersion: z.string().min(1),
    timeoutMs: z.number().int().positive()
  }),
  llm: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string().optional(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    timeoutMs: z.number().int().positive()
  }),
  retrieval: z.object({
    topK: z.number().int().min(1).max(10),
    topKByCorpus: z.record(CorpusNameSchema, z.number().int().min(1).max(50)),
    chatHistoryLimit: z.number().int().min(1).max(20),
    chatHistoryMinScore: z.number().min(0).max(1),
    chatHistoryWindow: z.number().int().min(0)
  }),
  router: z.object({
    strategy: RouterStrategySchema,
    confidenceFloor: z.number().min(-1).max(1),
    tieEpsilon: z.number().min(0).max(0.5),
    priority: z.array(CorpusNameSchema).min(1),
    onUnavailable: UnavailablePolicySchema
  }),
  contextBudgetTokens: z.number().int().min(64),
  pipelineDeadlineMs: z.number().int().positive(),
  persona: z.object({
    role: z.string().min(1),
    preferences: z.string().min(1),
    activity: z.string().min(1)
  }),
  maintenance: z.object({
    maxTurnsPerUser: z.number().int().positive().optional(),
    maxAgeDays: z.number().positive().optional()
  })
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.KB_DATA_DIR ?? ".data";
  const topK = intVar(env, "TOP_K_RETRIEVAL", 3);

  const raw = {
    dataDir,
    indexDir: env.KB_INDEX_DIR ?? path.join(dataDir, "indexes"),
    memoryDbPath: env.KB_MEMORY_DB_PATH ?? path.join(dataDir, "chat-memory.sqlite"),
    embedCachePath: env.KB_EMBED_CACHE_PATH ?? path.join(dataDir, "embed-cache.sqlite"),
    auditLogPath: env.KB_AUDIT_LOG_PATH || undefined,
    requestLogPath: env.KB_REQUEST_LOG_PATH || undefined,
    logLevel: env.LOG_LEVEL ?? "info",
    embeddings: {
      provider: env.EMBED_PROVIDER ?? "hashing",
      baseUrl: env.EMBED_BASE_URL ?? "http://localhost:1234/v1",
      apiKey: env.EMBED_API_KEY || undefined,
      model: env.EMBED_MODEL ?? "text-embedding-3-small",
      dims: intVar(env, "EMBED_DIMS", 384),
      requestDimensions: optionalIntVar(env, "EMBED_REQUEST_DIMENSIONS"),
      modelVersion: env.EMBED_MODEL_VERSION || "1",
      timeoutMs: intVar(env, "EMBED_TIMEOUT_MS", 15_000)
    },
    llm: {
      baseUrl: env.LLM_BASE_URL ?? "https://api.openai.com/v1",
      apiKey: env.LLM_API_KEY || env.OPENAI_API_KEY || undefined,
      model: env.LLM_MODEL ?? "gpt-4o-mini",
      temperature: numVar(env, "LLM_TEMPERATURE", 0.7),
      timeoutMs: intVar(env, "LLM_TIMEOUT_MS", 30_000)
    },
    retrieval: {
      topK,
      topKByCorpus: {
        docs: intVar(env, "TOP_K_DOCS", Math.max(topK, 6)),
        tickets: intVar(env, "TOP_K_TICKETS", Math.max(topK, 8)),
        configs: intVar(env, "TOP_K_CONFIGS", topK)
      },
      chatHistoryLimit: intVar(env, "CHAT_HISTORY_LIMIT", 5),
      chatHistoryMinScore: numVar(env, "CHAT_HISTORY_MIN_SCORE", 0),
      chatHistoryWindow: intVar(env, "CHAT_HISTORY_WINDOW", 0)
    },
    router: {
      strategy: env.ROUTER_STRATEGY ?? "nearest",
      confidenceFloor: numVar(env, "ROUTER_CONFIDENCE_FLOOR", 0.35),
      tieEpsilon: numVar(env, "ROUTER_TIE_EPSILON", 1e-6),
      priority: (env.ROUTER_PRIORITY ?? CORPORA.join(","))
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
      onUnavailable: env.ROUTER_ON_UNAVAILABLE ?? "fallback"
    },
    contextBudgetTokens: intVar(env, "CONTEXT_BUDGET_TOKENS", 1500),
    pipelineDeadlineMs: intVar(env, "PIPELINE_DEADLINE_MS", 60_000),
    persona: {
      role: env.DEFAULT_USER_ROLE ?? "Developer",
      preferences: env.DEFAULT_USER_PREFERENCES ?? "Concise, annotated responses",
      activity: env.DEFAULT_USER_ACTIVITY ?? "General troubleshooting"
    },
    maintenance: {
      maxTurnsPerUser: optionalNumVar(env, "MEMORY_MAX_TURNS_PER_USER"),
      maxAgeDays: optionalNumVar(env, "MEMORY_MAX_AGE_DAYS")
    }
  };

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

function numVar(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`Invalid ${name} value: ${raw}`);
  return n;
}

function intVar(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const n = numVar(env, name, fallback);
  if (!Number.isInteger(n)) throw new ConfigError(`Invalid ${name} value: expected an integer, got ${env[name]}`);
  return n;
}

function optionalNumVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return numVar(env, name, 0);
}

function optionalIntVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return intVar(env, name, 0);
}
