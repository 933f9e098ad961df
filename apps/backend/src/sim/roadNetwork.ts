import type { Position } from "../models/simulation";
import { InvalidConfigurationError } from "./errors";
import { HEADINGS, offset } from "./heading";
import { inBounds, positionKey } from "./position";

export const DEFAULT_LATTICE_SPACING = 3;

/**
 * Traversable cells of the grid. Other components only ask `isRoad` and `neighbors`;
 * the cell set itself stays private.
 */
export class RoadNetwork {
  private readonly roadCells: ReadonlySet<string>;

  private constructor(
    readonly gridSize: number,
    cells: Iterable<Position>,
  ) {
    const keys = new Set<string>();
    for (const cell of cells) {
      if (!inBounds(cell, gridSize)) {
        throw new InvalidConfigurationError(
          `Road cell (${cell.x},${cell.y}) lies outside a ${gridSize}x${gridSize} grid`,
        );
      }
      keys.add(positionKey(cell));
    }
    this.roadCells = keys;
  }

  static fullGrid(gridSize: number): RoadNetwork {
    return new RoadNetwork(gridSize, gridCells(gridSize, () => true));
  }

  /** Streets along every `spacing`-th row and column. */
  static lattice(gridSize: number, spacing = DEFAULT_LATTICE_SPACING): RoadNetwork {
    if (!Number.isInteger(spacing) || spacing < 1) {
      throw new InvalidConfigurationError(`Lattice spacing must be a positive integer, received ${spacing}`);
    }
    return new RoadNetwork(
      gridSize,
      gridCells(gridSize, (cell) => cell.x % spacing === 0 || cell.y % spacing === 0),
    );
  }

  static fromCells(gridSize: number, cells: Iterable<Position>): RoadNetwork {
    return new RoadNetwork(gridSize, cells);
  }

  isRoad(position: Position): boolean {
    return this.roadCells.has(positionKey(position));
  }

  /** Adjacent road cells, always in N, S, E, W order. */
  neighbors(position: Position): Position[] {
    return HEADINGS.map((heading) => offset(position, heading)).filter((cell) => this.isRoad(cell));
  }
}

function* gridCells(gridSize: number, include: (cell: Position) => boolean): Generator<Position> {
  for (let y = 0; y < gridSize; y += 1) {
    for (let x = 0; x < gridSize; x += 1) {
      const cell = { x, y };
      if (include(cell)) yield cell;
    }
  }
}
