import type { Heading, LightAxis, Position } from "../models/simulation";

export const HEADINGS: readonly Heading[] = ["N", "S", "E", "W"];

const HEADING_DELTAS: Record<Heading, Position> = {
  N: { x: 0, y: -1 },
  S: { x: 0, y: 1 },
  E: { x: 1, y: 0 },
  W: { x: -1, y: 0 },
};

const HEADING_AXES: Record<Heading, LightAxis> = {
  N: "NS",
  S: "NS",
  E: "EW",
  W: "EW",
};

export const isHeading = (value: unknown): value is Heading =>
  typeof value === "string" && (HEADINGS as readonly string[]).includes(value);

export const headingDelta = (heading: Heading): Position => ({ ...HEADING_DELTAS[heading] });

export const headingAxis = (heading: Heading): LightAxis => HEADING_AXES[heading];

export const offset = (position: Position, heading: Heading): Position => {
  const delta = HEADING_DELTAS[heading];
  return { x: position.x + delta.x, y: position.y + delta.y };
};

// Only defined for cardinal-adjacent cells.
export const headingBetween = (from: Position, to: Position): Heading | undefined =>
  HEADINGS.find((heading) => {
    const next = offset(from, heading);
    return next.x === to.x && next.y === to.y;
  });
