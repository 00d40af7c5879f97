import { EmbeddingFailureError } from "../errors.js";

export type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

export type Usage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type ChatCompletion = {
  text: string;
  usage?: Usage;
  raw: unknown;
};

export type ChatClient = {
  provider: string;
  model: string;
  complete(input: {
    messages: ChatMessage[];
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
    extraHeaders?: Record<string, string>;
  }): Promise<ChatCompletion>;
};

export type EmbeddingsClient = {
  provider: string;
  model: string;
  /**
   * Identity of the vector space. Indexes record it at build time and refuse to
   * load under a different one, since vectors from two models do not compare.
   */
  fingerprint: string;
  embed(input: { texts: string[]; signal?: AbortSignal; extraHeaders?: Record<string, string> }): Promise<Float32Array[]>;
};

export function embeddingFingerprint(input: { provider: string; model: string; version?: string | number }): string {
  return input.version === undefined
    ? `${input.provider}/${input.model}`
    : `${input.provider}/${input.model}@${input.version}`;
}

/** Embeds a single text; the provider must return exactly one vector. */
export async function embedOne(client: EmbeddingsClient, text: string, signal?: AbortSignal): Promise<Float32Array> {
  const [vector] = await client.embed({ texts: [text], signal });
  if (!vector) throw new EmbeddingFailureError(`Embedding provider ${client.fingerprint} returned no vector`, { transient: false });
  return vector;
}
