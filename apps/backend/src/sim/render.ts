import type { SimulationSnapshot } from "../models/simulation";
import { inBounds } from "./position";

export const GLYPHS = {
  empty: ".",
  greenNorthSouth: "+",
  redNorthSouth: "x",
  vehicle: "C",
} as const;

/** Text grid of a snapshot; vehicles are drawn over intersection glyphs. */
export const renderGrid = (snapshot: SimulationSnapshot): string => {
  const { gridSize } = snapshot;
  const rows = Array.from({ length: gridSize }, () => Array<string>(gridSize).fill(GLYPHS.empty));

  const paint = (x: number, y: number, glyph: string) => {
    const row = rows[y];
    if (row && inBounds({ x, y }, gridSize)) {
      row[x] = glyph;
    }
  };

  for (const intersection of snapshot.intersections) {
    const { x, y } = intersection.position;
    paint(x, y, intersection.NS === "green" ? GLYPHS.greenNorthSouth : GLYPHS.redNorthSouth);
  }
  for (const vehicle of snapshot.vehicles) {
    paint(vehicle.position.x, vehicle.position.y, GLYPHS.vehicle);
  }

  return rows.map((row) => row.join(" ")).join("\n");
};
