import type { Db } from "../db/db.js";
import { stableJsonHash } from "../util/hash.js";
import { bufferToFloat32Array, float32ArrayToBuffer } from "../vector/vector.js";
import type { EmbeddingsClient } from "./types.js";

/**
 * Memoizes vectors in SQLite keyed by (fingerprint, text hash). The wrapper keeps
 * the inner fingerprint, so cached and uncached vectors share one vector space.
 * Expects `embeddingCacheMigrations` applied to `db`.
 */
export function createCachedEmbeddingsClient(db: Db, inner: EmbeddingsClient): EmbeddingsClient {
  const select = db.prepare("SELECT vector_blob FROM embeddings WHERE fingerprint = ? AND hash = ? LIMIT 1");
  const insert = db.prepare(
    "INSERT OR IGNORE INTO embeddings(fingerprint, hash, dims, vector_blob) VALUES (?, ?, ?, ?)"
  );

  return {
    provider: inner.provider,
    model: inner.model,
    fingerprint: inner.fingerprint,
    async embed(input): Promise<Float32Array[]> {
      if (input.texts.length === 0) return [];
      const keyed = input.texts.map((text) => ({ text, h: stableJsonHash({ fingerprint: inner.fingerprint, text }) }));
      const found = new Map<string, Float32Array>();
      const missing = new Map<string, string>();

      for (const { text, h } of keyed) {
        if (found.has(h) || missing.has(h)) continue;
        const row = select.get(inner.fingerprint, h) as { vector_blob: Buffer } | undefined;
        if (row) found.set(h, bufferToFloat32Array(row.vector_blob));
        else missing.set(h, text);
      }

      if (missing.size > 0) {
        const pending = [...missing.entries()];
        const vectors = await inner.embed({ ...input, texts: pending.map(([, text]) => text) });
        const tx = db.transaction(() => {
          pending.forEach(([h], i) => {
            const v = vectors[i];
            if (!v) throw new Error(`Embedding provider ${inner.fingerprint} returned ${vectors.length} vectors for ${pending.length} texts`);
            insert.run(inner.fingerprint, h, v.length, float32ArrayToBuffer(v));
            found.set(h, v);
          });
        });
        tx();
      }

      return keyed.map(({ h }) => {
        const v = found.get(h);
        if (!v) throw new Error("Missing embedding unexpectedly");
        return v;
      });
    }
  };
}
