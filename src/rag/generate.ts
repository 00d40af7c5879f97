import { GenerationFailedError } from "../errors.js";
import type { ChatClient, ChatCompletion, Usage } from "../providers/types.js";
import type { AssembledContext } from "./context.js";
import type { PromptTemplate } from "./prompts.js";
import { buildMessages } from "./prompts.js";
import type { Persona } from "./types.js";

export type GeneratedAnswer = {
  text: string;
  template: PromptTemplate;
  usage?: Usage;
  provider: string;
  model: string;
};

/** One completion call. Every failure surfaces as GenerationFailedError. */
export async function generateAnswer(input: {
  chat: ChatClient;
  template: PromptTemplate;
  persona: Persona;
  context: AssembledContext;
  query: string;
  temperature?: number;
  signal?: AbortSignal;
}): Promise<GeneratedAnswer> {
  const messages = buildMessages({
    template: input.template,
    persona: input.persona,
    contextText: input.context.text,
    query: input.query
  });

  let res: ChatCompletion;
  try {
    res = await input.chat.complete({ messages, temperature: input.temperature, signal: input.signal });
  } catch (err) {
    if (err instanceof GenerationFailedError) throw err;
    const aborted = input.signal?.aborted || (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError"));
    throw new GenerationFailedError(`Chat provider ${input.chat.provider}/${input.chat.model} failed: ${String(err)}`, {
      kind: aborted ? "timeout" : "provider",
      cause: err
    });
  }

  const text = res.text.trim();
  if (!text) {
    throw new GenerationFailedError(`Chat provider ${input.chat.provider}/${input.chat.model} returned an empty completion`, {
      kind: "empty"
    });
  }
  return { text, template: input.template, usage: res.usage, provider: input.chat.provider, model: input.chat.model };
}
