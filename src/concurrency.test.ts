import { describe, it, expect } from "vitest";
import { runConcurrent, fanOutProjects } from "./concurrency.js";

function deferredDelay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runConcurrent", () => {
  it("keeps results in input order", async () => {
    const results = await runConcurrent([30, 10, 20], 3, async (ms) => {
      await deferredDelay(ms);
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it("never runs more than the concurrency limit at once", async () => {
    let active = 0;
    let peak = 0;
    await runConcurrent([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await deferredDelay(5);
      active--;
    });
    expect(peak).toBe(2);
  });

  it("returns an empty list for no items", async () => {
    expect(await runConcurrent([], 4, async () => 1)).toEqual([]);
  });
});

describe("fanOutProjects", () => {
  it("drops projects whose task throws and keeps the rest", async () => {
    const outcomes = await fanOutProjects(["a", "b", "c"], 2, "Scan", async (id) => {
      if (id === "b") throw new Error("API down");
      return id.toUpperCase();
    });
    expect(outcomes).toEqual([
      { projectId: "a", result: "A" },
      { projectId: "c", result: "C" },
    ]);
  });
});
