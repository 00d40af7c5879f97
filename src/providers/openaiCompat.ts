import { z } from "zod";

import { EmbeddingFailureError, GenerationFailedError } from "../errors.js";
import type { ChatClient, ChatCompletion, EmbeddingsClient, Usage } from "./types.js";
import { embeddingFingerprint } from "./types.js";

export type OpenAICompatOptions = {
  baseUrl: string;
  apiKey?: string;
  provider: string;
  model: string;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
};

export type OpenAICompatEmbeddingsOptions = OpenAICompatOptions & {
  /** Requested output size, for models that can shorten their vectors. Sent as `dimensions`. */
  dimensions?: number;
  /** Bump when the provider changes a model in place under the same name. */
  modelVersion?: string;
};

const ChatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional()
    })
    .optional()
});

const EmbeddingsResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int().optional() }))
});

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

function buildHeaders(opts: OpenAICompatOptions, extra?: Record<string, string>): Record<string, string> {
  const headers: Record<string, string> = {
    "content-type": "application/json",
    ...(opts.defaultHeaders ?? {}),
    ...(extra ?? {})
  };
  if (opts.apiKey) headers.authorization = `Bearer ${opts.apiKey}`;
  return headers;
}

function requestSignal(timeoutMs: number | undefined, signal: AbortSignal | undefined): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs && timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs));
  if (signals.length === 0) return undefined;
  return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

export function createOpenAICompatChatClient(opts: OpenAICompatOptions): ChatClient {
  const baseUrl = normalizeBaseUrl(opts.baseUrl);

  return {
    provider: opts.provider,
    model: opts.model,
    async complete(input): Promise<ChatCompletion> {
      const url = `${baseUrl}/chat/completions`;
      const body = {
        model: opts.model,
        messages: input.messages,
        temperature: input.temperature ?? 0.2,
        max_tokens: input.maxTokens
      };

      let res: Response;
      try {
        res = await fetch(url, {
          method: "POST",
          headers: buildHeaders(opts, input.extraHeaders),
          body: JSON.stringify(body),
          signal: requestSignal(opts.timeoutMs, input.signal)
        });
      } catch (err) {
        if (isAbort(err)) {
          throw new GenerationFailedError(`Chat completion timed out (${opts.provider}/${opts.model})`, {
            kind: "timeout",
            cause: err
          });
        }
        throw new GenerationFailedError(`Chat completion request failed: ${String(err)}`, { kind: "provider", cause: err });
      }

      if (!res.ok) {
        const text = await safeReadText(res);
        throw new GenerationFailedError(`Chat completion failed (${res.status}): ${text}`, {
          kind: classifyStatus(res.status),
          status: res.status
        });
      }

      const parsed = ChatResponseSchema.safeParse(await safeReadJson(res));
      if (!parsed.success) {
        throw new GenerationFailedError("Chat completion returned an unexpected payload", {
          kind: "provider",
          status: res.status,
          cause: parsed.error
        });
      }
      const text = parsed.data.choices[0]?.message?.content ?? "";
      return { text, usage: mapUsage(parsed.data.usage), raw: parsed.data };
    }
  };
}

export function createOpenAICompatEmbeddingsClient(opts: OpenAICompatEmbeddingsOptions): EmbeddingsClient {
  const baseUrl = normalizeBaseUrl(opts.baseUrl);
  const modelVersion = opts.modelVersion ?? "1";
  const version = opts.dimensions === undefined ? modelVersion : `${modelVersion}-d${opts.dimensions}`;

  return {
    provider: opts.provider,
    model: opts.model,
    fingerprint: embeddingFingerprint({ provider: opts.provider, model: opts.model, version }),
    async embed(input): Promise<Float32Array[]> {
      if (input.texts.length === 0) return [];
      const url = `${baseUrl}/embeddings`;
      const body = { model: opts.model, input: input.texts, ...(opts.dimensions === undefined ? {} : { dimensions: opts.dimensions }) };

      let res: Response;
      try {
        res = await fetch(url, {
          method: "POST",
          headers: buildHeaders(opts, input.extraHeaders),
          body: JSON.stringify(body),
          signal: requestSignal(opts.timeoutMs, input.signal)
        });
      } catch (err) {
        throw new EmbeddingFailureError(`Embeddings request failed: ${String(err)}`, { transient: true, cause: err });
      }

      if (!res.ok) {
        const text = await safeReadText(res);
        throw new EmbeddingFailureError(`Embeddings failed (${res.status}): ${text}`, {
          transient: res.status === 429 || res.status >= 500,
          status: res.status
        });
      }

      const parsed = EmbeddingsResponseSchema.safeParse(await safeReadJson(res));
      if (!parsed.success || parsed.data.data.length !== input.texts.length) {
        throw new EmbeddingFailureError("Embeddings returned an unexpected payload", { transient: false, status: res.status });
      }
      const ordered = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
      const wrongSize = ordered.find((d) => opts.dimensions !== undefined && d.embedding.length !== opts.dimensions);
      if (wrongSize) {
        throw new EmbeddingFailureError(
          `Embeddings returned ${wrongSize.embedding.length} dimensions, expected ${opts.dimensions}`,
          { transient: false, status: res.status }
        );
      }
      return ordered.map((d) => new Float32Array(d.embedding));
    }
  };
}

function classifyStatus(status: number): "auth" | "rate_limit" | "timeout" | "provider" {
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status === 408 || status === 504) return "timeout";
  return "provider";
}

function mapUsage(usage: z.infer<typeof ChatResponseSchema>["usage"]): Usage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens
  };
}

async function safeReadJson(res: Response): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    return null;
  }
}

async function safeReadText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "<failed to read response body>";
  }
}
