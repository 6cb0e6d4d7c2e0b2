import { InvalidConfigurationError } from "../errors.js";
import { cosineSimilarity } from "./similarity.js";
import type { Chunk, ScoredChunk } from "./types.js";

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidConfigurationError(`top-k must be a positive integer, got: ${k}`);
  }
}

// Array.prototype.sort is stable, so equal scores keep insertion order.
// A k of zero or less selects nothing.
export function topKSimilarChunks(params: {
  queryEmbedding: readonly number[];
  chunks: readonly Chunk[];
  k: number;
}): ScoredChunk[] {
  if (params.chunks.length === 0 || params.k <= 0) return [];

  return params.chunks
    .map((chunk) => ({ chunk, score: cosineSimilarity(params.queryEmbedding, chunk.embedding) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, params.k);
}
