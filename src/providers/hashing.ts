import { fnv1a32 } from "../util/hash.js";
import { l2Normalize } from "../vector/vector.js";
import type { EmbeddingsClient } from "./types.js";
import { embeddingFingerprint } from "./types.js";

export type HashingEmbedderOptions = {
  dims?: number;
  /** Bump when the tokenization changes; it is part of the fingerprint. */
  version?: number;
};

const HASHING_VERSION = 1;

/**
 * Offline embedder: signed feature hashing of lowercase word unigrams and
 * bigrams, L2-normalized. Deterministic across processes.
 */
export function createHashingEmbeddingsClient(opts: HashingEmbedderOptions = {}): EmbeddingsClient {
  const dims = Math.max(8, Math.floor(opts.dims ?? 384));
  const version = opts.version ?? HASHING_VERSION;
  const model = `feature-hash-${dims}`;

  return {
    provider: "hashing",
    model,
    fingerprint: embeddingFingerprint({ provider: "hashing", model, version }),
    async embed({ texts }): Promise<Float32Array[]> {
      return texts.map((t) => hashText(t, dims));
    }
  };
}

export function tokenizeForHashing(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length > 0);
}

function hashText(text: string, dims: number): Float32Array {
  const v = new Float32Array(dims);
  const tokens = tokenizeForHashing(text);
  const features = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) features.push(`${tokens[i]} ${tokens[i + 1]}`);

  for (const f of features) {
    const h = fnv1a32(f);
    const idx = h % dims;
    const sign = (h >>> 31) === 1 ? -1 : 1;
    v[idx] = v[idx]! + sign;
  }
  return l2Normalize(v);
}
