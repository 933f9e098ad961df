export type Heading = "N" | "S" | "E" | "W";

export type LightAxis = "NS" | "EW";

export type LightColor = "green" | "red";

export type LightState = Record<LightAxis, LightColor>;

export type RoadLayout = "grid" | "lattice";

export interface Position {
  x: number;
  y: number;
}

export interface VehicleSnapshot {
  id: number;
  position: Position;
  heading: Heading;
  destination?: Position;
}

export interface IntersectionSnapshot {
  position: Position;
  NS: LightColor;
  EW: LightColor;
}

export interface SimulationSnapshot {
  timeStep: number;
  gridSize: number;
  vehicles: VehicleSnapshot[];
  intersections: IntersectionSnapshot[];
}

export interface SimulationConfig {
  gridSize: number;
  vehicleCount: number;
  intersectionCycleLength: number;
  seed: number;
  roadLayout?: RoadLayout;
}

export interface IntersectionDefinition {
  position: Position;
  cycleLength?: number;
  initialState?: LightState;
}

export interface VehicleDefinition {
  id: number;
  position: Position;
  heading: Heading;
}

export interface RouteAssignment {
  vehicleId: number;
  route: Position[];
}
