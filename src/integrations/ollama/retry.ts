import { setTimeout as delay } from "node:timers/promises";

import {
  CancelledError,
  InvalidConfigurationError,
  isDocentError,
  throwIfCancelled,
  type DocentErrorKind
} from "../../errors.js";

export type RetryOptions = {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryOn: readonly DocentErrorKind[];
};

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 1,
  initialDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
  retryOn: ["transport"]
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err: unknown) {
    if (signal?.aborted) {
      throw new CancelledError("Operation cancelled during retry back-off", { cause: err });
    }
    throw err;
  }
}

/**
 * Decides whether and when a failed request is attempted again. Only
 * errors whose kind is listed in `retryOn` are retried, and cancellation
 * never is.
 */
export class RetryPolicy {
  readonly options: RetryOptions;
  private readonly sleep: Sleep;

  constructor(options: Partial<RetryOptions> = {}, sleep: Sleep = abortableSleep) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new InvalidConfigurationError(
        `maxAttempts must be a positive integer, got: ${this.options.maxAttempts}`
      );
    }
    if (this.options.initialDelayMs < 0 || this.options.maxDelayMs < 0) {
      throw new InvalidConfigurationError("Retry delays must not be negative");
    }
    this.sleep = sleep;
  }

  static none(): RetryPolicy {
    return new RetryPolicy({ maxAttempts: 1 });
  }

  isRetryable(error: unknown): boolean {
    return isDocentError(error) && error.kind !== "cancelled" && this.options.retryOn.includes(error.kind);
  }

  /** Delay before retry number `retry` (1-based). */
  delayBeforeRetry(retry: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs } = this.options;
    return Math.min(initialDelayMs * backoffMultiplier ** (retry - 1), maxDelayMs);
  }

  async run<T>(
    operation: (attempt: number) => Promise<T>,
    params: {
      signal?: AbortSignal;
      onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    } = {}
  ): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      throwIfCancelled(params.signal);
      try {
        return await operation(attempt);
      } catch (error: unknown) {
        if (attempt >= this.options.maxAttempts || !this.isRetryable(error)) {
          throw error;
        }
        const delayMs = this.delayBeforeRetry(attempt);
        params.onRetry?.(error, attempt, delayMs);
        await this.sleep(delayMs, params.signal);
      }
    }
  }
}
