import { type Logger, silentLogger } from "../logging/logger.js";
import { topKSimilarChunks } from "./search.js";
import type { Chunk, ScoredChunk } from "./types.js";

/**
 * In-memory, append-only collection of embedded chunks searched by brute-force
 * cosine similarity.
 *
 * Vectors of different lengths are compared over their common prefix. A
 * mismatch against the dimension of the first chunk is logged, not rejected.
 */
export class VectorIndex {
  private readonly chunks: Chunk[] = [];
  private readonly logger: Logger;

  constructor(params: { logger?: Logger } = {}) {
    this.logger = params.logger ?? silentLogger;
  }

  append(chunk: Chunk): void {
    const expected = this.dimension();
    if (expected !== undefined && chunk.embedding.length !== expected) {
      this.logger.warn("Embedding dimension mismatch on append", {
        expected,
        actual: chunk.embedding.length,
        source: chunk.source
      });
    }
    this.chunks.push(chunk);
  }

  clear(): void {
    this.chunks.length = 0;
  }

  size(): number {
    return this.chunks.length;
  }

  /** Dimension of the first chunk appended since the last clear. */
  dimension(): number | undefined {
    return this.chunks[0]?.embedding.length;
  }

  search(queryVector: readonly number[], topK: number): ScoredChunk[] {
    const expected = this.dimension();
    if (expected !== undefined && queryVector.length !== expected) {
      this.logger.warn("Query embedding dimension differs from index", {
        expected,
        actual: queryVector.length
      });
    }
    return topKSimilarChunks({ queryEmbedding: queryVector, chunks: this.chunks, k: topK });
  }

  snapshot(): readonly Chunk[] {
    return [...this.chunks];
  }
}
