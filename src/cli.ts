#!/usr/bin/env node
import { Command } from "commander";
import crypto from "node:crypto";
import path from "node:path";
import readline from "node:readline";

import { createApp, createAppLogger, createEmbedder, createScorer, pipelineSettings } from "./app.js";
import type { App } from "./app.js";
import { CORPORA, CorpusNameSchema, getConfig } from "./config.js";
import type { AppConfig, CorpusName } from "./config.js";
import { buildCorpusFromSource } from "./corpus/buildIndex.js";
import { artifactPathFor } from "./corpus/registry.js";
import { openDb } from "./db/db.js";
import { embeddingCacheMigrations } from "./db/migrations.js";
import { errorMessage } from "./errors.js";
import { seedChatMemory } from "./memory/seed.js";
import { embedWithRetry } from "./providers/retry.js";
import type { EmbeddingsClient } from "./providers/types.js";
import type { ChatRequest } from "./rag/pipeline.js";
import { runQuery } from "./rag/pipeline.js";
import { routeQuery } from "./rag/router.js";
import type { RoutingDecision } from "./rag/types.js";
import type { Logger } from "./util/log.js";
import { createLinePrompt } from "./util/prompt.js";

const program = new Command();
program.name("kb-router").description("Routes questions to the best knowledge corpus and answers with per-user chat memory");

program
  .command("build-index")
  .argument("<corpus>", `One of: ${CORPORA.join(", ")}`)
  .argument("<sourceDir>", "Folder holding the corpus files")
  .action(async (corpus: string, sourceDir: string) => {
    const cfg = getConfig();
    const name = parseCorpus(corpus);
    const res = await withBuildEmbedder(cfg, (embedder, logger) =>
      buildCorpusFromSource({ corpus: name, sourceDir, artifactPath: artifactPathFor(cfg.indexDir, name), embedder, logger })
    );
    console.log(JSON.stringify(res, null, 2));
  });

program
  .command("build-all")
  .argument("[dataDir]", "Folder with one subfolder per corpus", "")
  .action(async (dataDir: string) => {
    const cfg = getConfig();
    const root = dataDir || cfg.dataDir;
    const results = await withBuildEmbedder(cfg, async (embedder, logger) => {
      const out: Record<string, unknown> = {};
      for (const corpus of CORPORA) {
        try {
          out[corpus] = await buildCorpusFromSource({
            corpus,
            sourceDir: path.join(root, corpus),
            artifactPath: artifactPathFor(cfg.indexDir, corpus),
            embedder,
            logger
          });
        } catch (err) {
          out[corpus] = { error: errorMessage(err) };
        }
      }
      return out;
    });
    console.log(JSON.stringify(results, null, 2));
    if (Object.values(results).some((r) => typeof r === "object" && r !== null && "error" in r)) process.exitCode = 1;
  });

program
  .command("seed-memory")
  .argument("<chatHistoryDir>", "Folder of conversation JSON files")
  .action(async (dir: string) => {
    await withApp(async (app) => {
      const stats = await seedChatMemory(app.memory, dir, app.logger);
      console.log(JSON.stringify(stats, null, 2));
    });
  });

program
  .command("ask")
  .argument("<query>", "Question to answer")
  .option("--user <id>", "User id", "anonymous")
  .option("--session <id>", "Session id (new one if omitted)")
  .option("--role <role>", "Persona role")
  .option("--preferences <text>", "Persona preferences")
  .option("--activity <text>", "Persona activity")
  .action(async (query: string, opts: { user: string; session?: string; role?: string; preferences?: string; activity?: string }) => {
    await withApp(async (app) => {
      const res = await runQuery(app.deps, {
        user_query: query,
        user_id: opts.user,
        session_id: opts.session,
        user_role: opts.role,
        user_preferences: opts.preferences,
        user_activity: opts.activity
      });
      console.log(res.answer);
      console.log(`\nRoute: ${describeRoute(res.decision)}`);
      console.log(JSON.stringify({ sessionId: res.sessionId, retrieval: res.retrieval, timings: res.timings }, null, 2));
    });
  });

program
  .command("chat")
  .option("--user <id>", "User id", "anonymous")
  .option("--role <role>", "Persona role")
  .action(async (opts: { user: string; role?: string }) => {
    await withApp(async (app) => {
      const sessionId = crypto.randomUUID();
      console.log(`Session: ${sessionId}`);
      console.log("Type /memory to list your recent turns, /clear to forget them, /exit to quit.");

      const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      const ask = createLinePrompt(rl);

      try {
        while (true) {
          const line = await ask("> ");
          if (line === null) break;
          const q = line.trim();
          if (!q) continue;
          if (q === "/exit") break;
          if (q === "/memory") {
            await app.writer.flush();
            const turns = app.memory.listRecent(opts.user, 10).map((t) => ({
              role: t.role,
              text: t.text,
              timestamp: t.timestamp.toISOString()
            }));
            console.log(JSON.stringify(turns, null, 2));
            continue;
          }
          if (q === "/clear") {
            await app.writer.flush();
            console.log(`Removed ${await app.memory.clear(opts.user)} turns.`);
            continue;
          }

          const request: ChatRequest = { user_query: q, user_id: opts.user, session_id: sessionId, user_role: opts.role };
          try {
            const res = await runQuery(app.deps, request);
            console.log(res.answer);
            console.log(`\n[${describeRoute(res.decision)}]`);
          } catch (err) {
            console.error(errorMessage(err));
          }
        }
      } finally {
        rl.close();
      }
    });
  });

program
  .command("route")
  .argument("<query>", "Question to route")
  .option("--role <role>", "Persona role")
  .action(async (query: string, opts: { role?: string }) => {
    await withApp(async (app) => {
      const settings = pipelineSettings(app.config);
      const queryEmbedding = await embedWithRetry(app.embedder, query);
      const decision = await routeQuery({
        query,
        queryEmbedding,
        persona: { ...settings.persona, role: opts.role ?? settings.persona.role },
        corpora: app.registry,
        scorer: createScorer(app.config.router.strategy, app.chat),
        settings: settings.router,
        logger: app.logger
      });
      console.log(JSON.stringify(decision, null, 2));
    });
  });

program
  .command("prune")
  .option("--user <id>", "Only prune this user")
  .option("--max-turns <n>", "Keep at most N most recent turns per user", toInt)
  .option("--max-age-days <n>", "Delete turns older than N days", toNumber)
  .action(async (opts: { user?: string; maxTurns?: number; maxAgeDays?: number }) => {
    await withApp(async (app) => {
      const maxTurns = opts.maxTurns ?? app.config.maintenance.maxTurnsPerUser;
      const maxAgeDays = opts.maxAgeDays ?? app.config.maintenance.maxAgeDays;
      if (maxTurns === undefined && maxAgeDays === undefined) {
        throw new Error("Nothing to prune: pass --max-turns and/or --max-age-days");
      }
      const removed = await app.memory.prune({
        userId: opts.user,
        maxTurns,
        maxAgeMs: maxAgeDays === undefined ? undefined : maxAgeDays * 24 * 60 * 60 * 1000
      });
      console.log(JSON.stringify({ removed }, null, 2));
    });
  });

program.command("status").action(async () => {
  await withApp(async (app) => {
    const users = app.memory.listUsers();
    console.log(
      JSON.stringify(
        {
          embeddingFingerprint: app.embedder.fingerprint,
          routerStrategy: app.config.router.strategy,
          corpora: app.registry.status(),
          chatMemory: { users: users.length, turns: users.reduce((n, u) => n + app.memory.countByUser(u), 0) }
        },
        null,
        2
      )
    );
  });
});

program.parseAsync(process.argv).catch((err) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});

async function withApp(fn: (app: App) => Promise<void>): Promise<void> {
  const app = createApp(getConfig());
  try {
    await fn(app);
  } finally {
    await app.close();
  }
}

async function withBuildEmbedder<T>(
  cfg: AppConfig,
  fn: (embedder: EmbeddingsClient, logger: Logger) => Promise<T>
): Promise<T> {
  const cacheDb = openDb(cfg.embedCachePath, { migrations: embeddingCacheMigrations });
  try {
    return await fn(createEmbedder(cfg, cacheDb), createAppLogger(cfg));
  } finally {
    cacheDb.close();
  }
}

function describeRoute(decision: RoutingDecision): string {
  if (decision.kind === "corpus") return `${decision.corpus} (score ${decision.confidence.toFixed(3)})`;
  const best = decision.confidence === null ? "n/a" : decision.confidence.toFixed(3);
  return `fallback: ${decision.reason} (best ${best})`;
}

function parseCorpus(v: string): CorpusName {
  const parsed = CorpusNameSchema.safeParse(v);
  if (!parsed.success) throw new Error(`Unknown corpus "${v}". Expected one of: ${CORPORA.join(", ")}`);
  return parsed.data;
}

function toInt(v: string): number {
  const n = Number.parseInt(v, 10);
  if (!Number.isFinite(n)) throw new Error(`Invalid integer: ${v}`);
  return n;
}

function toNumber(v: string): number {
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number: ${v}`);
  return n;
}
