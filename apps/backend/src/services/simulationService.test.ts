import { afterEach, describe, expect, it, vi } from "vitest";
import { InvalidConfigurationError, VehicleNotFoundError } from "../sim/errors";
import { SimulationService, type SimulationServiceSettings } from "./simulationService";

const SETTINGS: SimulationServiceSettings = {
  gridSize: 10,
  vehicleCount: 5,
  intersectionCycleLength: 5,
  seed: 42,
  tickMs: 1000,
  autoRun: false,
};

describe("SimulationService", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("steps the hosted engine", () => {
    const service = new SimulationService(SETTINGS);

    expect(service.step().timeStep).toBe(1);
    expect(service.step(3).timeStep).toBe(4);
    expect(service.getSnapshot().vehicles).toHaveLength(5);
  });

  it("bounds the number of steps per call", () => {
    const service = new SimulationService(SETTINGS);

    expect(() => service.step(0)).toThrow(RangeError);
    expect(() => service.step(1001)).toThrow("count must be an integer between 1 and 1000");
    expect(service.getSnapshot().timeStep).toBe(0);
  });

  it("resets with overrides on top of the current config", () => {
    const service = new SimulationService(SETTINGS);
    service.step(2);

    const snapshot = service.reset({ gridSize: 6, vehicleCount: 2 });

    expect(snapshot.timeStep).toBe(0);
    expect(snapshot.gridSize).toBe(6);
    expect(snapshot.vehicles).toHaveLength(2);
    expect(service.getConfig()).toEqual({
      gridSize: 6,
      vehicleCount: 2,
      intersectionCycleLength: 5,
      seed: 42,
    });
  });

  it("keeps the running engine when a reset is rejected", () => {
    const service = new SimulationService(SETTINGS);
    service.step(2);

    expect(() => service.reset({ vehicleCount: 500 })).toThrow(InvalidConfigurationError);
    expect(service.getSnapshot().timeStep).toBe(2);
    expect(service.getConfig().vehicleCount).toBe(5);
  });

  it("refuses grids larger than the cap before building them", () => {
    const service = new SimulationService(SETTINGS);

    expect(() => service.reset({ gridSize: 100000 })).toThrow(RangeError);
    expect(() => service.reset({ gridSize: 501 })).toThrow("gridSize must not exceed 500, received 501");
    expect(service.getConfig().gridSize).toBe(10);
    expect(service.reset({ gridSize: 500, vehicleCount: 0 }).gridSize).toBe(500);
  });

  it("renders the current grid", () => {
    const service = new SimulationService({ ...SETTINGS, gridSize: 4, vehicleCount: 0 });

    expect(service.render()).toBe(["+ . . +", ". . . .", ". . . .", "+ . . +"].join("\n"));
  });

  it("plans paths and routes", () => {
    const service = new SimulationService({ ...SETTINGS, roadLayout: "lattice" });

    expect(service.findPath({ x: 0, y: 0 }, { x: 2, y: 0 })).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
    ]);
    expect(service.findPath({ x: 1, y: 1 }, { x: 2, y: 0 })).toEqual([]);
    expect(() => service.assignRoute(99, { x: 0, y: 0 })).toThrow(VehicleNotFoundError);
  });

  it("ticks on its clock until stopped", () => {
    vi.useFakeTimers();
    const service = new SimulationService(SETTINGS);

    service.startClock();
    service.startClock();
    expect(service.isRunning()).toBe(true);

    vi.advanceTimersByTime(3000);
    expect(service.getSnapshot().timeStep).toBe(3);

    service.stopClock();
    vi.advanceTimersByTime(3000);
    expect(service.isRunning()).toBe(false);
    expect(service.getSnapshot().timeStep).toBe(3);
  });

  it("starts the clock on construction when autoRun is set", () => {
    vi.useFakeTimers();
    const service = new SimulationService({ ...SETTINGS, autoRun: true, tickMs: 250 });

    vi.advanceTimersByTime(1000);

    expect(service.getSnapshot().timeStep).toBe(4);
    service.stopClock();
  });
});
