import { EmbeddingFailureError } from "../errors.js";
import type { EmbeddingsClient } from "./types.js";
import { embedOne } from "./types.js";

export type EmbedRetryOptions = {
  signal?: AbortSignal;
  retryDelayMs?: number;
  onRetry?: (err: EmbeddingFailureError) => void;
};

export function isTransientEmbeddingError(err: unknown): err is EmbeddingFailureError {
  return err instanceof EmbeddingFailureError && err.transient;
}

/** One retry on a transient failure; anything else, or a second failure, propagates. */
export async function embedWithRetry(client: EmbeddingsClient, text: string, opts: EmbedRetryOptions = {}): Promise<Float32Array> {
  try {
    return await embedOne(client, text, opts.signal);
  } catch (err) {
    if (!isTransientEmbeddingError(err) || opts.signal?.aborted) throw err;
    opts.onRetry?.(err);
    if (opts.retryDelayMs && opts.retryDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, opts.retryDelayMs));
    }
    return await embedOne(client, text, opts.signal);
  }
}
