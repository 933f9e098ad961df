import { describe, expect, it } from "vitest";
import type { Heading } from "../models/simulation";
import { InvalidConfigurationError } from "./errors";
import { Intersection } from "./intersection";

describe("Intersection", () => {
  it("starts with north-south green and a zero timer", () => {
    const intersection = new Intersection({ x: 3, y: 6 });

    expect(intersection.state).toEqual({ NS: "green", EW: "red" });
    expect(intersection.timer).toBe(0);
    expect(intersection.cycleLength).toBe(5);
  });

  it("flips exactly every cycleLength advances", () => {
    const intersection = new Intersection({ x: 0, y: 0 }, { cycleLength: 3 });
    const observed: string[] = [];

    for (let i = 0; i < 7; i += 1) {
      intersection.advance();
      observed.push(intersection.state.NS);
    }

    expect(observed).toEqual(["green", "green", "red", "red", "red", "green", "green"]);
    expect(intersection.timer).toBe(1);
  });

  it("resets the timer when the phase changes", () => {
    const intersection = new Intersection({ x: 0, y: 0 }, { cycleLength: 2 });

    intersection.advance();
    expect(intersection.timer).toBe(1);
    intersection.advance();
    expect(intersection.timer).toBe(0);
    expect(intersection.state).toEqual({ NS: "red", EW: "green" });
  });

  it("swaps on every advance with a cycle of one", () => {
    const intersection = new Intersection({ x: 0, y: 0 }, { cycleLength: 1 });

    intersection.advance();
    expect(intersection.state.EW).toBe("green");
    intersection.advance();
    expect(intersection.state.NS).toBe("green");
  });

  it("keeps exactly one axis green", () => {
    const intersection = new Intersection({ x: 0, y: 0 }, { cycleLength: 4 });

    for (let i = 0; i < 40; i += 1) {
      intersection.advance();
      const { NS, EW } = intersection.state;
      expect([NS, EW].filter((color) => color === "green")).toHaveLength(1);
    }
  });

  it("answers green by heading axis", () => {
    const intersection = new Intersection({ x: 0, y: 0 }, { initialState: { NS: "red", EW: "green" } });

    expect(intersection.isGreenFor("N")).toBe(false);
    expect(intersection.isGreenFor("S")).toBe(false);
    expect(intersection.isGreenFor("E")).toBe(true);
    expect(intersection.isGreenFor("W")).toBe(true);
  });

  it("reports red for headings outside the four cardinals", () => {
    const intersection = new Intersection({ x: 0, y: 0 });
    const fromWire: Heading = JSON.parse('"NE"');

    expect(intersection.isGreenFor(fromWire)).toBe(false);
  });

  it("does not share its state object", () => {
    const intersection = new Intersection({ x: 0, y: 0 });
    const state = intersection.state;
    state.NS = "red";

    expect(intersection.state.NS).toBe("green");
  });

  it("rejects invalid cycle lengths and light states", () => {
    expect(() => new Intersection({ x: 0, y: 0 }, { cycleLength: 0 })).toThrow(InvalidConfigurationError);
    expect(() => new Intersection({ x: 0, y: 0 }, { cycleLength: 2.5 })).toThrow(InvalidConfigurationError);
    expect(
      () => new Intersection({ x: 0, y: 0 }, { initialState: { NS: "green", EW: "green" } }),
    ).toThrow("Exactly one light axis must start green");
  });

  it("exports a snapshot of position and lights", () => {
    const intersection = new Intersection({ x: 6, y: 3 });

    expect(intersection.toSnapshot()).toEqual({ position: { x: 6, y: 3 }, NS: "green", EW: "red" });
  });
});
