export type TextChunk = { text: string; tokenCount: number; index: number };

export type ChunkConfig = {
  chunkSizeTokens: number;
  overlapTokens: number;
};

/** Word-window chunking; consecutive chunks share `overlapTokens` words. */
export function chunkText(text: string, cfg: ChunkConfig): TextChunk[] {
  const chunkSize = Math.max(1, Math.floor(cfg.chunkSizeTokens));
  const overlap = Math.min(chunkSize - 1, Math.max(0, Math.floor(cfg.overlapTokens)));
  const tokens = tokenize(text);
  if (tokens.length === 0) return [];

  const out: TextChunk[] = [];
  let start = 0;
  while (start < tokens.length) {
    const end = Math.min(tokens.length, start + chunkSize);
    const slice = tokens.slice(start, end);
    out.push({ text: slice.join(" "), tokenCount: slice.length, index: out.length });
    if (end === tokens.length) break;
    start = end - overlap;
  }
  return out;
}

export function normalizeText(input: string): string {
  return input
    .replace(/\u0000/g, "")
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/\s+/g)
    .filter(Boolean);
}
