import { describe, expect, it } from "vitest";
import { runBounded } from "./concurrency";

describe("runBounded", () => {
  it("keeps input order and never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runBounded([30, 10, 20, 5, 15], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight -= 1;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it("returns an empty list for no items", async () => {
    expect(await runBounded([], 4, async () => 1)).toEqual([]);
  });
});
