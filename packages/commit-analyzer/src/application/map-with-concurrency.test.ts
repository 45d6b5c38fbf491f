import { describe, expect, it } from "vitest";
import { foldSequentially, mapWithConcurrency } from "./map-with-concurrency.js";

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("mapWithConcurrency", () => {
  it("keeps input order and never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (value) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight -= 1;
      return value * 10;
    });

    expect(results).toEqual([10, 20, 30, 40, 50, 60]);
    expect(peak).toBe(2);
  });

  it.each([Number.NaN, 0, -3, Number.POSITIVE_INFINITY])(
    "runs every handler one at a time for limit %s",
    async (limit) => {
      let inFlight = 0;
      let peak = 0;

      const results = await mapWithConcurrency(["a", "b", "c"], limit, async (value, index) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight -= 1;
        return `${value}${index}`;
      });

      expect(results).toEqual(["a0", "b1", "c2"]);
      expect(peak).toBe(1);
    },
  );

  it("stops handing out work after a failure", async () => {
    const started: number[] = [];

    await expect(
      mapWithConcurrency([1, 2, 3, 4], 1, async (value) => {
        started.push(value);
        if (value === 2) {
          throw new Error("boom");
        }
        return value;
      }),
    ).rejects.toThrow("boom");
    expect(started).toEqual([1, 2]);
  });
});

describe("foldSequentially", () => {
  it("threads state through each step in order", async () => {
    const visited = await foldSequentially(["a", "b", "c"], "", async (state, value, index) => {
      await tick();
      return `${state}${value}${index}`;
    });

    expect(visited).toBe("a0b1c2");
  });
});
