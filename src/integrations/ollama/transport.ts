import { DEFAULT_TIMEOUT_MS } from "../../config/settings.js";
import { CancelledError, TransportError, throwIfCancelled } from "../../errors.js";

export type HttpRequest = {
  method: "GET" | "POST";
  url: string;
  body?: string;
  signal?: AbortSignal;
};

export type HttpResponse = {
  status: number;
  ok: boolean;
  body: string;
};

/** The only seam between the core and the network. */
export type HttpTransport = {
  send(request: HttpRequest): Promise<HttpResponse>;
};

export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(params: { timeoutMs?: number; fetchImpl?: typeof fetch } = {}) {
    this.timeoutMs = params.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = params.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    throwIfCancelled(request.signal);

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.body === undefined ? undefined : { "Content-Type": "application/json" },
        body: request.body,
        signal
      });
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } catch (err: unknown) {
      if (request.signal?.aborted) {
        throw new CancelledError(`Request to ${request.url} was cancelled`, { cause: err });
      }
      if (timeout.aborted) {
        throw new TransportError(`Request to ${request.url} timed out after ${this.timeoutMs} ms`, {
          cause: err
        });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request to ${request.url} failed: ${message}`, { cause: err });
    }
  }
}
