import { MalformedResponseError } from "../../errors.js";
import { type Logger, silentLogger } from "../../logging/logger.js";
import { postJson } from "./http.js";
import { RetryPolicy } from "./retry.js";
import type { HttpTransport } from "./transport.js";

export type GenerationClient = {
  /** Resolves `undefined` when the service answered without `response` text. */
  generate(model: string, prompt: string, signal?: AbortSignal): Promise<string | undefined>;
};

export class OllamaGenerationClient implements GenerationClient {
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
    this.url = `${params.baseUrl}/api/generate`;
    this.transport = params.transport;
    this.retry = params.retry ?? RetryPolicy.none();
    this.logger = params.logger ?? silentLogger;
  }

  async generate(model: string, prompt: string, signal?: AbortSignal): Promise<string | undefined> {
    return this.retry.run(
      async () => {
        const body = await postJson({
          transport: this.transport,
          url: this.url,
          payload: { model, prompt, stream: false },
          signal
        });
        const response = body.response;
        if (response === undefined || response === null) return undefined;
        if (typeof response !== "string") {
          throw new MalformedResponseError(`Response from ${this.url} has a non-string "response"`);
        }
        return response;
      },
      {
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("Retrying generation request", {
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
