import { z } from "zod";

import type { SearchableCorpus } from "../corpus/types.js";
import type { ChatClient } from "../providers/types.js";
import { cosineSimilarity } from "../vector/vector.js";
import type { Persona } from "./types.js";

export type ScoreInput = {
  query: string;
  queryEmbedding: Float32Array;
  persona: Persona;
  corpus: SearchableCorpus;
  signal?: AbortSignal;
};

/**
 * Affinity of one corpus for one query. Implementations score each corpus on
 * its own and must return values on a shared scale (higher = better match).
 */
export interface CorpusScorer {
  readonly name: string;
  score(input: ScoreInput): Promise<number>;
}

/** Similarity of the best chunk in the corpus. */
export function createNearestChunkScorer(): CorpusScorer {
  return {
    name: "nearest",
    async score({ queryEmbedding, corpus }) {
      return corpus.search(queryEmbedding, 1)[0]?.score ?? 0;
    }
  };
}

/** Similarity to the mean of all chunk vectors. */
export function createCentroidScorer(): CorpusScorer {
  return {
    name: "centroid",
    async score({ queryEmbedding, corpus }) {
      return corpus.centroid ? cosineSimilarity(queryEmbedding, corpus.centroid) : 0;
    }
  };
}

export const DEFAULT_CORPUS_DESCRIPTIONS: Record<string, string> = {
  docs: "Good for answering questions about documentation",
  tickets: "Good for answering questions about tickets",
  configs: "Good for answering questions about configs"
};

const RatingSchema = z.object({ score: z.number().min(0).max(1) });

/**
 * Asks the language model how well a corpus description fits the query.
 * Output that is not a JSON `{ "score": 0..1 }` counts as 0.
 */
export function createLlmScorer(chat: ChatClient, descriptions: Record<string, string> = DEFAULT_CORPUS_DESCRIPTIONS): CorpusScorer {
  return {
    name: "llm",
    async score({ query, persona, corpus, signal }) {
      const name = corpus.info.corpus;
      const description = descriptions[name] ?? `Knowledge corpus "${name}"`;
      const res = await chat.complete({
        messages: [
          { role: "system", content: "You rate retrieval sources. Output ONLY JSON. No markdown." },
          {
            role: "user",
            content: [
              "How likely is it that this knowledge source holds the answer to the question?",
              `Return ONLY: { "score": <number between 0 and 1> }`,
              "",
              `Source: ${name}`,
              `Description: ${description}`,
              `Asker role: ${persona.role}`,
              "",
              "Question:",
              query
            ].join("\n")
          }
        ],
        temperature: 0.0,
        maxTokens: 20,
        signal
      });
      return parseRating(res.text);
    }
  };
}

export function parseRating(text: string): number {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) return 0;
  try {
    const parsed = RatingSchema.safeParse(JSON.parse(text.slice(start, end + 1)));
    return parsed.success ? parsed.data.score : 0;
  } catch {
    return 0;
  }
}
