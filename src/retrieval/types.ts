export type Chunk = {
  embedding: number[];
  text: string;
  source: string;
};

export type ScoredChunk = {
  chunk: Chunk;
  score: number;
};
