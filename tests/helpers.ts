import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { CorpusIndex } from "../src/corpus/corpusIndex.js";
import type { Chunk, ChunkMetadata } from "../src/corpus/types.js";
import { EmbeddingFailureError } from "../src/errors.js";
import type { ChatClient, ChatCompletion, ChatMessage, EmbeddingsClient } from "../src/providers/types.js";
import type { LogRecord, Logger } from "../src/util/log.js";
import { createLogger } from "../src/util/log.js";
import { l2Normalize } from "../src/vector/vector.js";

export const VOCAB = [
  "staging",
  "redeploy",
  "deploy",
  "pipeline",
  "ticket",
  "login",
  "timeout",
  "bug",
  "config",
  "yaml",
  "database",
  "replicas",
  "coffee",
  "espresso",
  "weather",
  "rain"
] as const;

export const VOCAB_DIMS = VOCAB.length;

const VOCAB_INDEX = new Map<string, number>(VOCAB.map((w, i) => [w, i]));

/** One dimension per vocabulary word; unknown words contribute nothing. */
export function vocabVector(text: string): Float32Array {
  const v = new Float32Array(VOCAB_DIMS);
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
    const idx = VOCAB_INDEX.get(word);
    if (idx !== undefined) v[idx] = (v[idx] ?? 0) + 1;
  }
  return l2Normalize(v);
}

export type FakeEmbedder = EmbeddingsClient & { calls: string[][]; failNext: (n: number, transient?: boolean) => void };

export function createFakeEmbedder(opts: { model?: string } = {}): FakeEmbedder {
  const model = opts.model ?? `vocab-${VOCAB_DIMS}`;
  let failures = 0;
  let transient = true;
  const calls: string[][] = [];
  return {
    provider: "fake",
    model,
    fingerprint: `fake/${model}`,
    calls,
    failNext(n, isTransient = true) {
      failures = n;
      transient = isTransient;
    },
    async embed({ texts }) {
      calls.push([...texts]);
      if (failures > 0) {
        failures -= 1;
        throw new EmbeddingFailureError("fake embedder failure", { transient, status: transient ? 503 : 400 });
      }
      return texts.map(vocabVector);
    }
  };
}

export type ScriptedChat = ChatClient & { calls: ChatMessage[][] };

/** Answers with `reply(messages)`; throws whatever `reply` throws. */
export function createScriptedChat(reply: (messages: ChatMessage[]) => string | Promise<string>): ScriptedChat {
  const calls: ChatMessage[][] = [];
  return {
    provider: "scripted",
    model: "scripted-1",
    calls,
    async complete({ messages }): Promise<ChatCompletion> {
      calls.push(messages);
      const text = await reply(messages);
      return { text, usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }, raw: null };
    }
  };
}

export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  return { logger: createLogger({ level: "debug", sinks: [(r) => records.push(r)] }), records };
}

export function makeTempDir(prefix = "kb-router-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const p = path.join(root, rel);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, content, "utf8");
  }
}

/** In-memory snapshot built from texts with the vocabulary embedder. */
export function makeIndex(corpus: string, texts: string[], metadata: ChunkMetadata = {}): CorpusIndex {
  const chunks: Chunk[] = texts.map((text, i) => ({
    id: i + 1,
    sourceCorpus: corpus,
    text,
    embedding: vocabVector(text),
    metadata: { ...metadata, id: `${corpus}-${i + 1}` }
  }));
  return CorpusIndex.fromChunks(
    {
      corpus,
      fingerprint: `fake/vocab-${VOCAB_DIMS}`,
      dims: VOCAB_DIMS,
      chunkCount: chunks.length,
      builtAt: "2026-01-01T00:00:00.000Z",
      artifactPath: `:memory:${corpus}`
    },
    chunks
  );
}
