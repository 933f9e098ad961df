import type { Position } from "../models/simulation";

export const positionKey = (position: Position) => `${position.x},${position.y}`;

export const samePosition = (a: Position, b: Position) => a.x === b.x && a.y === b.y;

export const inBounds = (position: Position, gridSize: number) =>
  position.x >= 0 && position.x < gridSize && position.y >= 0 && position.y < gridSize;

export const clonePosition = (position: Position): Position => ({ x: position.x, y: position.y });
