import { describe, expect, it } from "vitest";
import { headingBetween, headingDelta } from "./heading";

describe("headings", () => {
  it("maps headings to unit deltas", () => {
    expect(headingDelta("N")).toEqual({ x: 0, y: -1 });
    expect(headingDelta("S")).toEqual({ x: 0, y: 1 });
    expect(headingDelta("E")).toEqual({ x: 1, y: 0 });
    expect(headingDelta("W")).toEqual({ x: -1, y: 0 });
  });

  it("derives the heading between adjacent cells", () => {
    expect(headingBetween({ x: 2, y: 2 }, { x: 2, y: 1 })).toBe("N");
    expect(headingBetween({ x: 2, y: 2 }, { x: 1, y: 2 })).toBe("W");
    expect(headingBetween({ x: 2, y: 2 }, { x: 3, y: 3 })).toBeUndefined();
  });
});
