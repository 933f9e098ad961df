import { describe, expect, it } from "vitest";
import { createRandom } from "./random";

describe("createRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const first = createRandom(42);
    const second = createRandom(42);
    const a = Array.from({ length: 5 }, () => first.next());
    const b = Array.from({ length: 5 }, () => second.next());

    expect(a).toEqual(b);
    expect(a.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it("diverges for different seeds", () => {
    expect(createRandom(1).next()).not.toBe(createRandom(2).next());
  });

  it("keeps integers inside the requested range", () => {
    const random = createRandom(7);

    for (let i = 0; i < 100; i += 1) {
      const value = random.nextInt(4);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(4);
    }
  });

  it("refuses to pick from an empty collection", () => {
    expect(() => createRandom(1).pick([])).toThrow("Cannot pick random value from an empty collection");
  });
});
