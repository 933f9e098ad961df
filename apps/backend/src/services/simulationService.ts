import { env } from "../config/env";
import type {
  Position,
  RouteAssignment,
  SimulationConfig,
  SimulationSnapshot,
} from "../models/simulation";
import { SimulationEngine, renderGrid } from "../sim";
import { logger } from "../utils/logger";

export interface SimulationServiceSettings extends SimulationConfig {
  tickMs: number;
  autoRun: boolean;
}

export const MAX_STEPS_PER_REQUEST = 1000;
export const MAX_GRID_SIZE = 500;

/**
 * Hosts one engine for the HTTP layer. The optional clock ticks it from the event
 * loop, so a tick never overlaps a request handler.
 */
export class SimulationService {
  private static instance: SimulationService | undefined;
  private engine: SimulationEngine;
  private config: SimulationConfig;
  private readonly tickMs: number;
  private timer: NodeJS.Timeout | undefined;

  static getInstance(): SimulationService {
    if (!SimulationService.instance) {
      SimulationService.instance = new SimulationService(env.simulation);
    }

    return SimulationService.instance;
  }

  constructor(settings: SimulationServiceSettings) {
    const { tickMs, autoRun, ...config } = settings;
    this.config = config;
    this.tickMs = tickMs;
    this.engine = SimulationEngine.initialize(config);
    logger.info("Simulation initialized", { config });
    if (autoRun) {
      this.startClock();
    }
  }

  getConfig(): SimulationConfig {
    return { ...this.config };
  }

  getSnapshot(): SimulationSnapshot {
    return this.engine.snapshot();
  }

  render(): string {
    return renderGrid(this.engine.snapshot());
  }

  step(count = 1): SimulationSnapshot {
    if (!Number.isInteger(count) || count < 1 || count > MAX_STEPS_PER_REQUEST) {
      throw new RangeError(`count must be an integer between 1 and ${MAX_STEPS_PER_REQUEST}`);
    }
    for (let i = 0; i < count; i += 1) {
      this.engine.step();
    }
    logger.debug("Simulation stepped", { count, timeStep: this.engine.timeStep });
    return this.engine.snapshot();
  }

  /** Replaces the engine; the previous one is kept when the new config is rejected. */
  reset(overrides: Partial<SimulationConfig> = {}): SimulationSnapshot {
    const next: SimulationConfig = { ...this.config, ...overrides };
    if (next.gridSize > MAX_GRID_SIZE) {
      throw new RangeError(`gridSize must not exceed ${MAX_GRID_SIZE}, received ${next.gridSize}`);
    }
    this.engine = SimulationEngine.initialize(next);
    this.config = next;
    logger.info("Simulation reset", { config: next });
    return this.engine.snapshot();
  }

  findPath(from: Position, to: Position): Position[] {
    return this.engine.findPath(from, to);
  }

  assignRoute(vehicleId: number, destination: Position): RouteAssignment {
    const route = this.engine.assignRoute(vehicleId, destination);
    if (route.length === 0) {
      logger.warn("No route found", { vehicleId, destination });
    } else {
      logger.info("Route assigned", { vehicleId, destination, length: route.length });
    }
    return { vehicleId, route };
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  startClock() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.engine.step();
      } catch (error) {
        logger.error("Simulation tick failed", { error });
        this.stopClock();
      }
    }, this.tickMs);
    this.timer.unref();
    logger.info("Simulation clock started", { tickMs: this.tickMs });
  }

  stopClock() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    logger.info("Simulation clock stopped", { timeStep: this.engine.timeStep });
  }
}
