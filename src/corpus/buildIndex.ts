import fs from "node:fs";

import { openDb, writeMeta } from "../db/db.js";
import type { Db } from "../db/db.js";
import { indexArtifactMigrations } from "../db/migrations.js";
import type { CorpusName } from "../config.js";
import { corpusLoaders } from "../ingestion/loaders.js";
import type { EmbeddingsClient } from "../providers/types.js";
import { ensureParentDir, removeQuietly, replaceFile, tempSiblingPath } from "../util/fs.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import { float32ArrayToBuffer } from "../vector/vector.js";
import type { ChunkInput, IndexInfo } from "./types.js";

export type BuildIndexOptions = {
  corpus: string;
  artifactPath: string;
  embedder: EmbeddingsClient;
  chunks: ChunkInput[];
  batchSize?: number;
  logger?: Logger;
};

/**
 * Embeds `chunks` and writes a fresh artifact beside the target, then renames it
 * into place. A failed build leaves the previous artifact untouched.
 */
export async function buildCorpusIndex(opts: BuildIndexOptions): Promise<IndexInfo> {
  const logger = opts.logger ?? silentLogger;
  const batchSize = Math.max(1, Math.floor(opts.batchSize ?? 64));
  const chunks = opts.chunks
    .map((c) => ({ text: c.text.trim(), metadata: c.metadata ?? {} }))
    .filter((c) => c.text.length > 0);
  if (chunks.length === 0) {
    throw new Error(`Refusing to build an empty index for corpus "${opts.corpus}"`);
  }

  ensureParentDir(opts.artifactPath);
  const tempPath = tempSiblingPath(opts.artifactPath);
  let db: Db | undefined;

  try {
    db = openDb(tempPath, { migrations: indexArtifactMigrations, wal: false });
    const insert = db.prepare("INSERT INTO chunks(text, metadata_json, dims, vector_blob) VALUES (?, ?, ?, ?)");
    let dims = 0;

    for (let start = 0; start < chunks.length; start += batchSize) {
      const batch = chunks.slice(start, start + batchSize);
      const vectors = await opts.embedder.embed({ texts: batch.map((c) => c.text) });
      if (vectors.length !== batch.length) {
        throw new Error(`Embedder returned ${vectors.length} vectors for ${batch.length} chunks`);
      }

      const writeBatch = db.transaction(() => {
        batch.forEach((c, i) => {
          const v = vectors[i];
          if (!v) throw new Error(`Embedder returned no vector for chunk ${start + i}`);
          if (dims === 0) dims = v.length;
          if (v.length !== dims) throw new Error(`Inconsistent embedding size: ${v.length} vs ${dims}`);
          insert.run(c.text, JSON.stringify(c.metadata), v.length, float32ArrayToBuffer(v));
        });
      });
      writeBatch();
      logger.debug("index.build.batch", { corpus: opts.corpus, done: Math.min(start + batchSize, chunks.length), total: chunks.length });
    }

    const builtAt = new Date().toISOString();
    writeMeta(db, "index_meta", {
      corpus: opts.corpus,
      fingerprint: opts.embedder.fingerprint,
      dims,
      chunk_count: chunks.length,
      built_at: builtAt
    });
    db.close();
    db = undefined;

    replaceFile(tempPath, opts.artifactPath);
    logger.info("index.build.completed", {
      corpus: opts.corpus,
      chunks: chunks.length,
      fingerprint: opts.embedder.fingerprint,
      artifactPath: opts.artifactPath
    });

    return {
      corpus: opts.corpus,
      fingerprint: opts.embedder.fingerprint,
      dims,
      chunkCount: chunks.length,
      builtAt,
      artifactPath: opts.artifactPath
    };
  } catch (err) {
    db?.close();
    if (fs.existsSync(tempPath)) removeQuietly(tempPath);
    logger.error("index.build.failed", { corpus: opts.corpus, error: err });
    throw err;
  }
}

export type SourceBuildResult = IndexInfo & { filesRead: number; filesSkipped: number };

/** Loads every file of one corpus from `sourceDir` and builds its artifact. */
export async function buildCorpusFromSource(opts: {
  corpus: CorpusName;
  sourceDir: string;
  artifactPath: string;
  embedder: EmbeddingsClient;
  logger?: Logger;
}): Promise<SourceBuildResult> {
  const loaded = await corpusLoaders[opts.corpus]({ sourceDir: opts.sourceDir, logger: opts.logger });
  const info = await buildCorpusIndex({
    corpus: opts.corpus,
    artifactPath: opts.artifactPath,
    embedder: opts.embedder,
    chunks: loaded.chunks,
    logger: opts.logger
  });
  return { ...info, filesRead: loaded.filesRead, filesSkipped: loaded.filesSkipped };
}
