import { MalformedResponseError } from "../../errors.js";
import { type Logger, silentLogger } from "../../logging/logger.js";
import { postJson } from "./http.js";
import { RetryPolicy } from "./retry.js";
import type { HttpTransport } from "./transport.js";

export type EmbeddingClient = {
  embed(text: string, model: string, signal?: AbortSignal): Promise<number[]>;
};

export function parseEmbedding(body: Record<string, unknown>, url: string): number[] {
  const embedding = body.embedding;
  if (!Array.isArray(embedding) || embedding.length === 0) {
    throw new MalformedResponseError(`Response from ${url} has no "embedding" array`);
  }
  const vector: number[] = [];
  for (const value of embedding) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new MalformedResponseError(`Response from ${url} has a non-numeric embedding value`);
    }
    vector.push(value);
  }
  return vector;
}

export class OllamaEmbeddingClient implements EmbeddingClient {
  private readonly url: string;
  private readonly transport: HttpTransport;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(params: {
    baseUrl: string;
    transport: HttpTransport;
    retry?: RetryPolicy;
    logger?: Logger;
  }) {
    this.url = `${params.baseUrl}/api/embeddings`;
    this.transport = params.transport;
    this.retry = params.retry ?? RetryPolicy.none();
    this.logger = params.logger ?? silentLogger;
  }

  async embed(text: string, model: string, signal?: AbortSignal): Promise<number[]> {
    return this.retry.run(
      async () => {
        const body = await postJson({
          transport: this.transport,
          url: this.url,
          payload: { model, prompt: text },
          signal
        });
        return parseEmbedding(body, this.url);
      },
      {
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("Retrying embedding request", {
            model,
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      }
    );
  }
}
