import type { Position } from "../models/simulation";
import { clonePosition, positionKey, samePosition } from "./position";
import type { RoadNetwork } from "./roadNetwork";

export class PathFinder {
  constructor(private readonly network: RoadNetwork) {}

  /**
   * Breadth-first shortest path, endpoints included. Returns `[]` when either end is
   * off-road or the goal cannot be reached. Equal-length paths resolve by neighbor
   * order, so the first one discovered wins.
   */
  findPath(start: Position, goal: Position): Position[] {
    if (!this.network.isRoad(start) || !this.network.isRoad(goal)) return [];
    if (samePosition(start, goal)) return [clonePosition(start)];

    const cameFrom = new Map<string, Position | null>([[positionKey(start), null]]);
    const queue: Position[] = [clonePosition(start)];

    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      if (!current) break;

      for (const next of this.network.neighbors(current)) {
        const key = positionKey(next);
        if (cameFrom.has(key)) continue;
        cameFrom.set(key, current);
        if (samePosition(next, goal)) {
          return this.reconstruct(cameFrom, next);
        }
        queue.push(next);
      }
    }

    return [];
  }

  private reconstruct(cameFrom: Map<string, Position | null>, goal: Position): Position[] {
    const path: Position[] = [];
    let cursor: Position | null | undefined = goal;
    while (cursor) {
      path.push(cursor);
      cursor = cameFrom.get(positionKey(cursor));
    }
    return path.reverse();
  }
}
