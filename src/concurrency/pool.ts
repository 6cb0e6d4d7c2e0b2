import { InvalidConfigurationError } from "../errors.js";

export function assertConcurrency(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidConfigurationError(`Concurrency must be a positive integer, got: ${limit}`);
  }
}

/**
 * Run `worker` over `items` with at most `limit` calls in flight. Items are
 * started in order. After the first failure no new item is started; calls
 * already running settle and the first error is rethrown.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  assertConcurrency(limit);

  const queue = items.entries();
  const state: { failure?: { error: unknown } } = {};

  const runner = async (): Promise<void> => {
    for (const [index, item] of queue) {
      if (state.failure) return;
      try {
        await worker(item, index);
      } catch (error: unknown) {
        state.failure ??= { error };
      }
    }
  };

  const runners = Array.from({ length: Math.min(limit, items.length) }, () => runner());
  await Promise.all(runners);

  if (state.failure) {
    throw state.failure.error;
  }
}
