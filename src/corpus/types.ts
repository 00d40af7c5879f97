export type ChunkMetadata = Record<string, string | number | boolean | null>;

export type Chunk = {
  id: number;
  sourceCorpus: string;
  text: string;
  embedding: Float32Array;
  metadata: ChunkMetadata;
};

export type ChunkInput = { text: string; metadata?: ChunkMetadata };

export type ScoredChunk = { chunk: Chunk; score: number };

export type IndexInfo = {
  corpus: string;
  fingerprint: string;
  dims: number;
  chunkCount: number;
  builtAt: string;
  artifactPath: string;
};

/** What the router and assembler need from a corpus, whatever backs it. */
export interface SearchableCorpus {
  readonly info: IndexInfo;
  readonly centroid: Float32Array | undefined;
  search(queryEmbedding: Float32Array, k: number): ScoredChunk[];
}
