export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends SimulationError {}

export class VehicleNotFoundError extends SimulationError {
  constructor(readonly vehicleId: number) {
    super(`Vehicle ${vehicleId} does not exist`);
  }
}
