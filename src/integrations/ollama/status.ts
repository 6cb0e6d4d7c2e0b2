import { type Logger, silentLogger } from "../../logging/logger.js";
import type { HttpTransport } from "./transport.js";

/** Reachability probe against `/api/tags`. Resolves `false` instead of throwing. */
export async function ping(params: {
  baseUrl: string;
  transport: HttpTransport;
  logger?: Logger;
  signal?: AbortSignal;
}): Promise<boolean> {
  const logger = params.logger ?? silentLogger;
  const url = `${params.baseUrl}/api/tags`;
  try {
    const response = await params.transport.send({ method: "GET", url, signal: params.signal });
    if (!response.ok) {
      logger.debug("Status endpoint answered with an error", { url, status: response.status });
    }
    return response.ok;
  } catch (err: unknown) {
    logger.debug("Status endpoint unreachable", {
      url,
      error: err instanceof Error ? err.message : String(err)
    });
    return false;
  }
}
