import type {
  IntersectionDefinition,
  Position,
  RoadLayout,
  SimulationConfig,
  SimulationSnapshot,
  VehicleDefinition,
} from "../models/simulation";
import { InvalidConfigurationError, VehicleNotFoundError } from "./errors";
import { HEADINGS, isHeading } from "./heading";
import { Intersection, type IntersectionOptions } from "./intersection";
import { PathFinder } from "./pathFinder";
import { inBounds, positionKey } from "./position";
import { createRandom } from "./random";
import { RoadNetwork } from "./roadNetwork";
import { Vehicle } from "./vehicle";

/** Control cells sit on every third row and column. */
export const INTERSECTION_SPACING = 3;

export interface EngineLayout {
  gridSize: number;
  intersections: IntersectionDefinition[];
  vehicles: VehicleDefinition[];
  roadNetwork?: RoadNetwork;
}

const requirePositiveInteger = (name: string, value: number) => {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidConfigurationError(`${name} must be a positive integer, received ${value}`);
  }
};

const buildRoadNetwork = (gridSize: number, layout: RoadLayout) =>
  layout === "lattice"
    ? RoadNetwork.lattice(gridSize, INTERSECTION_SPACING)
    : RoadNetwork.fullGrid(gridSize);

/** Control cells of the standard layout, one on every `INTERSECTION_SPACING`-th row and column. */
export const latticeIntersections = (gridSize: number, cycleLength: number): IntersectionDefinition[] => {
  const intersections: IntersectionDefinition[] = [];
  for (let y = 0; y < gridSize; y += INTERSECTION_SPACING) {
    for (let x = 0; x < gridSize; x += INTERSECTION_SPACING) {
      intersections.push({ position: { x, y }, cycleLength });
    }
  }
  return intersections;
};

export class SimulationEngine {
  readonly gridSize: number;
  private timeStepValue = 0;
  // Kept in ascending id order; that order is the move priority within a tick.
  private readonly vehicles: Vehicle[];
  private readonly intersections = new Map<string, Intersection>();
  private readonly pathFinder: PathFinder;

  constructor(layout: EngineLayout) {
    requirePositiveInteger("gridSize", layout.gridSize);
    this.gridSize = layout.gridSize;
    const roadNetwork = layout.roadNetwork ?? RoadNetwork.fullGrid(layout.gridSize);
    if (roadNetwork.gridSize !== layout.gridSize) {
      throw new InvalidConfigurationError(
        `Road network is sized ${roadNetwork.gridSize}, engine grid is ${layout.gridSize}`,
      );
    }
    this.pathFinder = new PathFinder(roadNetwork);

    for (const definition of layout.intersections) {
      this.assertInBounds("Intersection", definition.position);
      const key = positionKey(definition.position);
      if (this.intersections.has(key)) {
        throw new InvalidConfigurationError(`Duplicate intersection at ${key}`);
      }
      const options: IntersectionOptions = {};
      if (definition.cycleLength !== undefined) options.cycleLength = definition.cycleLength;
      if (definition.initialState !== undefined) options.initialState = definition.initialState;
      this.intersections.set(key, new Intersection(definition.position, options));
    }

    const ids = new Set<number>();
    const occupied = new Set<string>();
    for (const definition of layout.vehicles) {
      this.assertInBounds(`Vehicle ${definition.id}`, definition.position);
      const key = positionKey(definition.position);
      if (ids.has(definition.id)) {
        throw new InvalidConfigurationError(`Duplicate vehicle id ${definition.id}`);
      }
      if (occupied.has(key)) {
        throw new InvalidConfigurationError(`Vehicles overlap at ${key}`);
      }
      if (this.intersections.has(key)) {
        throw new InvalidConfigurationError(`Vehicle ${definition.id} starts on control cell ${key}`);
      }
      if (!isHeading(definition.heading)) {
        throw new InvalidConfigurationError(`Vehicle ${definition.id} has unknown heading`);
      }
      ids.add(definition.id);
      occupied.add(key);
    }
    this.vehicles = layout.vehicles
      .map((definition) => new Vehicle(definition.id, definition.position, definition.heading))
      .sort((a, b) => a.id - b.id);
  }

  /**
   * Builds the standard layout: control cells on the every-third lattice and
   * `vehicleCount` vehicles on distinct free road cells with random headings.
   */
  static initialize(config: SimulationConfig): SimulationEngine {
    const { gridSize, vehicleCount, intersectionCycleLength, seed } = config;
    requirePositiveInteger("gridSize", gridSize);
    requirePositiveInteger("intersectionCycleLength", intersectionCycleLength);
    if (!Number.isInteger(vehicleCount) || vehicleCount < 0) {
      throw new InvalidConfigurationError(
        `vehicleCount must be a non-negative integer, received ${vehicleCount}`,
      );
    }

    const intersections = latticeIntersections(gridSize, intersectionCycleLength);
    const roadNetwork = buildRoadNetwork(gridSize, config.roadLayout ?? "grid");
    // Vehicles start on road cells only.
    const freeCells: Position[] = [];
    for (let y = 0; y < gridSize; y += 1) {
      for (let x = 0; x < gridSize; x += 1) {
        const cell = { x, y };
        const isControlCell = x % INTERSECTION_SPACING === 0 && y % INTERSECTION_SPACING === 0;
        if (!isControlCell && roadNetwork.isRoad(cell)) {
          freeCells.push(cell);
        }
      }
    }
    if (vehicleCount > freeCells.length) {
      throw new InvalidConfigurationError(
        `Cannot place ${vehicleCount} vehicles: only ${freeCells.length} free road cells on a ${gridSize}x${gridSize} grid`,
      );
    }

    const random = createRandom(seed);
    const vehicles: VehicleDefinition[] = [];
    for (let id = 0; id < vehicleCount; id += 1) {
      // Partial Fisher-Yates: the chosen cell is swapped out of the candidate range.
      const index = id + random.nextInt(freeCells.length - id);
      const cell = freeCells[index];
      const swap = freeCells[id];
      if (!cell || !swap) break;
      freeCells[index] = swap;
      freeCells[id] = cell;
      vehicles.push({ id, position: cell, heading: random.pick(HEADINGS) });
    }

    return new SimulationEngine({
      gridSize,
      intersections,
      vehicles,
      roadNetwork,
    });
  }

  get timeStep(): number {
    return this.timeStepValue;
  }

  /**
   * Advances one tick: lights first, then one move per vehicle in ascending id order.
   * A move is refused when it leaves the grid, enters a control cell on red, or targets
   * a cell that is claimed this tick or still held by another vehicle.
   */
  step() {
    for (const intersection of this.intersections.values()) {
      intersection.advance();
    }

    const plans = this.vehicles.map((vehicle) => {
      vehicle.chooseNextHeading();
      return { vehicle, candidate: vehicle.peekNextPosition() };
    });

    const occupied = new Set(this.vehicles.map((vehicle) => positionKey(vehicle.position)));
    for (const { vehicle, candidate } of plans) {
      if (!inBounds(candidate, this.gridSize)) continue;

      const candidateKey = positionKey(candidate);
      const intersection = this.intersections.get(candidateKey);
      if (intersection && !intersection.isGreenFor(vehicle.heading)) continue;
      if (occupied.has(candidateKey)) continue;

      occupied.delete(positionKey(vehicle.position));
      vehicle.commitMove(candidate);
      occupied.add(candidateKey);
    }

    this.timeStepValue += 1;
  }

  snapshot(): SimulationSnapshot {
    return {
      timeStep: this.timeStepValue,
      gridSize: this.gridSize,
      vehicles: this.vehicles.map((vehicle) => vehicle.toSnapshot()),
      intersections: [...this.intersections.values()].map((intersection) => intersection.toSnapshot()),
    };
  }

  findPath(start: Position, goal: Position): Position[] {
    return this.pathFinder.findPath(start, goal);
  }

  /** Plans a route for one vehicle; an unreachable destination leaves it untouched. */
  assignRoute(vehicleId: number, destination: Position): Position[] {
    const vehicle = this.vehicles.find((candidate) => candidate.id === vehicleId);
    if (!vehicle) {
      throw new VehicleNotFoundError(vehicleId);
    }
    const route = this.findPath(vehicle.position, destination);
    if (route.length > 0) {
      vehicle.assignRoute(route);
    }
    return route;
  }

  private assertInBounds(label: string, position: Position) {
    if (!Number.isInteger(position.x) || !Number.isInteger(position.y) || !inBounds(position, this.gridSize)) {
      throw new InvalidConfigurationError(
        `${label} at (${position.x},${position.y}) is outside a ${this.gridSize}x${this.gridSize} grid`,
      );
    }
  }
}
