export type DocentErrorKind =
  | "invalid_configuration"
  | "not_found"
  | "transport"
  | "service"
  | "malformed_response"
  | "cancelled";

export abstract class DocentError extends Error {
  abstract readonly kind: DocentErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends DocentError {
  readonly kind = "invalid_configuration";
}

export class NotFoundError extends DocentError {
  readonly kind = "not_found";
}

/** Network failure or timeout before a response status was received. */
export class TransportError extends DocentError {
  readonly kind = "transport";
}

export class ServiceError extends DocentError {
  readonly kind = "service";
  readonly status: number;
  readonly body: string;

  constructor(message: string, params: { status: number; body: string }) {
    super(message);
    this.status = params.status;
    this.body = params.body;
  }
}

export class MalformedResponseError extends DocentError {
  readonly kind = "malformed_response";
}

export class CancelledError extends DocentError {
  readonly kind = "cancelled";

  constructor(message = "Operation cancelled", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isDocentError(err: unknown): err is DocentError {
  return err instanceof DocentError;
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError("Operation cancelled", { cause: signal.reason });
  }
}
