import { Mutex } from "../concurrency/mutex.js";
import { type SessionConfig, type Settings, normalizeBaseUrl } from "../config/settings.js";
import { InvalidConfigurationError } from "../errors.js";
import { OllamaEmbeddingClient } from "../integrations/ollama/embeddings.js";
import { OllamaGenerationClient } from "../integrations/ollama/generate.js";
import { RetryPolicy } from "../integrations/ollama/retry.js";
import { ping } from "../integrations/ollama/status.js";
import { FetchTransport, type HttpTransport } from "../integrations/ollama/transport.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { VectorIndex } from "../retrieval/vectorIndex.js";
import { answerQuestion } from "./answer.js";
import { type ProgressSink, ingestDirectory } from "./ingest.js";

/**
 * Owns one vector index and runs index, query and clear operations against it
 * one at a time. Session configuration is passed with every call.
 */
export class RagEngine {
  private readonly index: VectorIndex;
  private readonly lock = new Mutex();
  private readonly transport: HttpTransport;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly embedConcurrency: number;

  constructor(
    params: {
      transport?: HttpTransport;
      retry?: RetryPolicy;
      logger?: Logger;
      embedConcurrency?: number;
    } = {}
  ) {
    this.transport = params.transport ?? new FetchTransport();
    this.retry = params.retry ?? RetryPolicy.none();
    this.logger = params.logger ?? silentLogger;
    this.embedConcurrency = params.embedConcurrency ?? 1;
    this.index = new VectorIndex({ logger: this.logger });
  }

  static fromSettings(settings: Settings, logger: Logger = silentLogger): RagEngine {
    return new RagEngine({
      transport: new FetchTransport({ timeoutMs: settings.requestTimeoutMs }),
      retry: new RetryPolicy({
        maxAttempts: settings.maxAttempts,
        initialDelayMs: settings.retryDelayMs
      }),
      logger,
      embedConcurrency: settings.embedConcurrency
    });
  }

  async indexDocuments(
    session: SessionConfig,
    params: { onProgress?: ProgressSink; signal?: AbortSignal } = {}
  ): Promise<number> {
    const folder = session.documentsFolder;
    if (!folder) {
      throw new InvalidConfigurationError("No documents folder configured");
    }
    return this.lock.runExclusive(() =>
      ingestDirectory({
        folder,
        embeddingModel: session.embeddingModel,
        index: this.index,
        embeddings: this.clients(session).embeddings,
        onProgress: params.onProgress,
        signal: params.signal,
        chunkSize: session.chunkSize,
        chunkOverlap: session.chunkOverlap,
        concurrency: this.embedConcurrency,
        logger: this.logger
      })
    );
  }

  async answer(
    question: string,
    session: SessionConfig,
    params: { signal?: AbortSignal } = {}
  ): Promise<string> {
    return this.lock.runExclusive(() => {
      const { embeddings, generator } = this.clients(session);
      return answerQuestion({
        question,
        llmModel: session.llmModel,
        embeddingModel: session.embeddingModel,
        topK: session.topK,
        index: this.index,
        embeddings,
        generator,
        signal: params.signal,
        logger: this.logger
      });
    });
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(() => this.index.clear());
  }

  size(): number {
    return this.index.size();
  }

  async ping(session: Pick<SessionConfig, "baseUrl">, signal?: AbortSignal): Promise<boolean> {
    return ping({
      baseUrl: normalizeBaseUrl(session.baseUrl),
      transport: this.transport,
      logger: this.logger,
      signal
    });
  }

  private clients(session: SessionConfig): {
    embeddings: OllamaEmbeddingClient;
    generator: OllamaGenerationClient;
  } {
    const shared = {
      baseUrl: normalizeBaseUrl(session.baseUrl),
      transport: this.transport,
      retry: this.retry,
      logger: this.logger
    };
    return {
      embeddings: new OllamaEmbeddingClient(shared),
      generator: new OllamaGenerationClient(shared)
    };
  }
}
