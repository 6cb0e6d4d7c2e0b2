import { DEFAULT_TOP_K } from "../config/settings.js";
import { throwIfCancelled } from "../errors.js";
import type { EmbeddingClient } from "../integrations/ollama/embeddings.js";
import type { GenerationClient } from "../integrations/ollama/generate.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { assertTopK } from "../retrieval/search.js";
import type { VectorIndex } from "../retrieval/vectorIndex.js";
import { NO_DOCUMENTS_MESSAGE, NO_RESPONSE_MESSAGE, buildPrompt } from "./context.js";

export async function answerQuestion(params: {
  question: string;
  llmModel: string;
  embeddingModel: string;
  topK?: number;
  index: VectorIndex;
  embeddings: EmbeddingClient;
  generator: GenerationClient;
  signal?: AbortSignal;
  logger?: Logger;
}): Promise<string> {
  if (params.index.size() === 0) {
    return NO_DOCUMENTS_MESSAGE;
  }

  const logger = params.logger ?? silentLogger;
  const topK = params.topK ?? DEFAULT_TOP_K;
  assertTopK(topK);
  throwIfCancelled(params.signal);

  const queryEmbedding = await params.embeddings.embed(
    params.question,
    params.embeddingModel,
    params.signal
  );
  const top = params.index.search(queryEmbedding, topK);
  logger.debug("Retrieved context", {
    chunks: top.length,
    sources: top.map((t) => t.chunk.source).join(","),
    bestScore: top[0]?.score
  });

  const prompt = await buildPrompt({ question: params.question, chunks: top.map((t) => t.chunk) });
  const answer = await params.generator.generate(params.llmModel, prompt, params.signal);

  return answer ? answer : NO_RESPONSE_MESSAGE;
}
