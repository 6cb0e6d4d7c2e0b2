import { MalformedResponseError, ServiceError } from "../../errors.js";
import type { HttpTransport } from "./transport.js";

const BODY_EXCERPT_LENGTH = 200;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonObject(body: string, url: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err: unknown) {
    throw new MalformedResponseError(`Response from ${url} is not valid JSON`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new MalformedResponseError(`Response from ${url} is not a JSON object`);
  }
  return parsed;
}

export async function postJson(params: {
  transport: HttpTransport;
  url: string;
  payload: Record<string, unknown>;
  signal?: AbortSignal;
}): Promise<Record<string, unknown>> {
  const response = await params.transport.send({
    method: "POST",
    url: params.url,
    body: JSON.stringify(params.payload),
    signal: params.signal
  });

  if (!response.ok) {
    const excerpt = response.body.slice(0, BODY_EXCERPT_LENGTH);
    throw new ServiceError(`Request to ${params.url} failed (${response.status}): ${excerpt}`, {
      status: response.status,
      body: excerpt
    });
  }

  return parseJsonObject(response.body, params.url);
}
