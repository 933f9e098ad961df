export { SimulationEngine, INTERSECTION_SPACING, latticeIntersections } from "./engine";
export type { EngineLayout } from "./engine";
export { InvalidConfigurationError, SimulationError, VehicleNotFoundError } from "./errors";
export { HEADINGS, headingAxis, headingDelta, isHeading } from "./heading";
export { Intersection, DEFAULT_CYCLE_LENGTH } from "./intersection";
export type { IntersectionOptions } from "./intersection";
export { PathFinder } from "./pathFinder";
export { createRandom } from "./random";
export type { RandomSource } from "./random";
export { renderGrid } from "./render";
export { RoadNetwork, DEFAULT_LATTICE_SPACING } from "./roadNetwork";
export { Vehicle } from "./vehicle";
