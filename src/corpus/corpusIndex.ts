import fs from "node:fs";
import { z } from "zod";

import { openDb, readMeta } from "../db/db.js";
import type { Db } from "../db/db.js";
import { IndexUnavailableError } from "../errors.js";
import { bufferToFloat32Array, centroid, compareScored, cosineSimilarity, pushTopK } from "../vector/vector.js";
import type { Scored } from "../vector/vector.js";
import type { Chunk, ChunkMetadata, IndexInfo, ScoredChunk, SearchableCorpus } from "./types.js";

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

/**
 * Immutable in-memory snapshot of one artifact. Loaded fully before it is
 * published, so a reader never sees a half-built index.
 */
export class CorpusIndex implements SearchableCorpus {
  readonly info: IndexInfo;
  readonly centroid: Float32Array | undefined;
  private readonly chunks: readonly Chunk[];

  private constructor(info: IndexInfo, chunks: Chunk[]) {
    this.info = info;
    this.chunks = chunks;
    this.centroid = centroid(chunks.map((c) => c.embedding));
  }

  static fromChunks(info: IndexInfo, chunks: Chunk[]): CorpusIndex {
    return new CorpusIndex(info, chunks);
  }

  /**
   * Opens `<artifactPath>` read-only. Any problem surfaces as IndexUnavailableError
   * naming the corpus, including a fingerprint that differs from `expectedFingerprint`.
   */
  static load(input: { corpus: string; artifactPath: string; expectedFingerprint: string }): CorpusIndex {
    const { corpus, artifactPath } = input;
    if (!fs.existsSync(artifactPath)) {
      throw new IndexUnavailableError({ corpus, reason: "missing", artifactPath });
    }

    let db: Db;
    try {
      db = openDb(artifactPath, { readonly: true });
    } catch (err) {
      throw new IndexUnavailableError({ corpus, reason: "corrupt", artifactPath, detail: String(err), cause: err });
    }

    try {
      const meta = readMeta(db, "index_meta");
      const fingerprint = meta.get("fingerprint");
      const dims = Number(meta.get("dims"));
      if (!fingerprint || !Number.isInteger(dims) || dims <= 0) {
        throw new IndexUnavailableError({ corpus, reason: "unbuilt", artifactPath, detail: "artifact has no index metadata" });
      }
      const storedCorpus = meta.get("corpus");
      if (storedCorpus && storedCorpus !== corpus) {
        throw new IndexUnavailableError({
          corpus,
          reason: "corrupt",
          artifactPath,
          detail: `artifact belongs to corpus "${storedCorpus}"`
        });
      }
      if (fingerprint !== input.expectedFingerprint) {
        throw new IndexUnavailableError({
          corpus,
          reason: "fingerprint_mismatch",
          artifactPath,
          detail: `built with ${fingerprint}, active embedder is ${input.expectedFingerprint}`
        });
      }

      const rows = db.prepare("SELECT id, text, metadata_json, dims, vector_blob FROM chunks ORDER BY id ASC").all() as {
        id: number;
        text: string;
        metadata_json: string;
        dims: number;
        vector_blob: Buffer;
      }[];
      if (rows.length === 0) {
        throw new IndexUnavailableError({ corpus, reason: "unbuilt", artifactPath, detail: "artifact has no chunks" });
      }

      const chunks: Chunk[] = rows.map((row) => {
        const embedding = bufferToFloat32Array(row.vector_blob);
        if (embedding.length !== dims) {
          throw new IndexUnavailableError({
            corpus,
            reason: "corrupt",
            artifactPath,
            detail: `chunk ${row.id} has ${embedding.length} dims, index declares ${dims}`
          });
        }
        return {
          id: row.id,
          sourceCorpus: corpus,
          text: row.text,
          embedding,
          metadata: parseMetadata(row.metadata_json)
        };
      });

      return new CorpusIndex(
        {
          corpus,
          fingerprint,
          dims,
          chunkCount: chunks.length,
          builtAt: meta.get("built_at") ?? "",
          artifactPath
        },
        chunks
      );
    } catch (err) {
      if (err instanceof IndexUnavailableError) throw err;
      throw new IndexUnavailableError({ corpus, reason: "corrupt", artifactPath, detail: String(err), cause: err });
    } finally {
      db.close();
    }
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Cosine similarity, descending; ties resolve to the lower chunk id. */
  search(queryEmbedding: Float32Array, k: number): ScoredChunk[] {
    const limit = Math.max(0, Math.floor(k));
    if (limit === 0) return [];
    if (queryEmbedding.length !== this.info.dims) {
      throw new Error(
        `Query vector has ${queryEmbedding.length} dims, corpus "${this.info.corpus}" expects ${this.info.dims}`
      );
    }

    const top: Scored<Chunk>[] = [];
    for (const chunk of this.chunks) {
      pushTopK(top, limit, { item: chunk, score: cosineSimilarity(queryEmbedding, chunk.embedding), tieKey: chunk.id });
    }
    return top.sort(compareScored).map((s) => ({ chunk: s.item, score: s.score }));
  }
}

function parseMetadata(json: string): ChunkMetadata {
  try {
    const res = MetadataSchema.safeParse(JSON.parse(json));
    return res.success ? res.data : {};
  } catch {
    return {};
  }
}
