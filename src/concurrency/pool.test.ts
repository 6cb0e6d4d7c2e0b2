import { describe, expect, it } from "vitest";

import { InvalidConfigurationError } from "../errors.js";
import { runWithConcurrency } from "./pool.js";

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 1));

describe("runWithConcurrency", () => {
  it("processes every item in order when the limit is one", async () => {
    const seen: number[] = [];
    await runWithConcurrency([10, 20, 30], 1, async (item) => {
      await tick();
      seen.push(item);
    });
    expect(seen).toEqual([10, 20, 30]);
  });

  it("never exceeds the limit", async () => {
    let active = 0;
    let peak = 0;
    const items = Array.from({ length: 12 }, (_, i) => i);

    await runWithConcurrency(items, 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      active -= 1;
    });

    expect(peak).toBe(3);
  });

  it("passes each item with its index", async () => {
    const pairs: string[] = [];
    await runWithConcurrency(["a", "b"], 2, async (item, index) => {
      pairs.push(`${index}:${item}`);
    });
    expect(pairs.sort()).toEqual(["0:a", "1:b"]);
  });

  it("stops starting new work after a failure and rethrows it", async () => {
    const started: number[] = [];
    const run = runWithConcurrency([1, 2, 3, 4, 5], 1, async (item) => {
      started.push(item);
      if (item === 2) throw new Error("item 2 failed");
    });

    await expect(run).rejects.toThrow("item 2 failed");
    expect(started).toEqual([1, 2]);
  });

  it("does nothing for an empty list", async () => {
    await expect(runWithConcurrency([], 4, async () => {})).resolves.toBeUndefined();
  });

  it("rejects a non-positive limit", async () => {
    await expect(runWithConcurrency([1], 0, async () => {})).rejects.toThrow(
      InvalidConfigurationError
    );
  });
});
