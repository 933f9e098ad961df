import type { Request, Response } from "express";
import type { Position, RoadLayout, SimulationConfig } from "../models/simulation";
import { SimulationService } from "../services/simulationService";
import { SimulationError, VehicleNotFoundError } from "../sim";
import { logger } from "../utils/logger";

const parseCoordinate = (value: unknown): Position | undefined => {
  if (typeof value !== "string") return undefined;
  const parts = value.split(",").map((part) => part.trim());
  if (parts.length !== 2 || parts.some((part) => part.length === 0)) return undefined;
  const [x, y] = parts.map(Number);
  if (x === undefined || y === undefined || !Number.isInteger(x) || !Number.isInteger(y)) return undefined;
  return { x, y };
};

const parsePosition = (value: unknown): Position | undefined => {
  if (typeof value !== "object" || value === null) return undefined;
  if (!("x" in value) || !("y" in value)) return undefined;
  const { x, y } = value;
  if (typeof x !== "number" || typeof y !== "number") return undefined;
  if (!Number.isInteger(x) || !Number.isInteger(y)) return undefined;
  return { x, y };
};

// JSON bodies carry numbers; query-style numeric strings are accepted too.
const parseInteger = (value: unknown) => {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim().length > 0) return Number(value);
  return Number.NaN;
};

const errorStatus = (error: unknown) => {
  if (error instanceof VehicleNotFoundError) return 404;
  if (error instanceof SimulationError || error instanceof RangeError) return 400;
  return 500;
};

const RESET_FIELDS = [
  ["gridSize", "gridSize"],
  ["vehicleCount", "vehicleCount"],
  ["cycleLength", "intersectionCycleLength"],
  ["seed", "seed"],
] as const;

export class SimulationController {
  constructor(private readonly service: SimulationService = SimulationService.getInstance()) {}

  getSnapshot = (_req: Request, res: Response) => {
    res.json(this.service.getSnapshot());
  };

  render = (_req: Request, res: Response) => {
    res.type("text/plain").send(this.service.render());
  };

  step = (req: Request, res: Response) => {
    const { count } = (req.body ?? {}) as { count?: unknown };
    const steps = count === undefined ? 1 : parseInteger(count);
    if (!Number.isInteger(steps)) {
      res.status(400).json({ error: "count must be an integer" });
      return;
    }
    this.respond(res, () => this.service.step(steps), "Failed to step simulation");
  };

  reset = (req: Request, res: Response) => {
    const body = (req.body ?? {}) as Record<string, unknown>;
    const overrides: Partial<SimulationConfig> = {};

    for (const [field, key] of RESET_FIELDS) {
      const raw = body[field];
      if (raw === undefined) continue;
      const parsed = parseInteger(raw);
      if (!Number.isInteger(parsed)) {
        res.status(400).json({ error: `${field} must be an integer` });
        return;
      }
      overrides[key] = parsed;
    }

    if (body.roadLayout !== undefined) {
      const validLayouts: RoadLayout[] = ["grid", "lattice"];
      const layout = validLayouts.find((candidate) => candidate === body.roadLayout);
      if (!layout) {
        res.status(400).json({ error: `roadLayout must be one of ${validLayouts.join(", ")}` });
        return;
      }
      overrides.roadLayout = layout;
    }

    this.respond(res, () => this.service.reset(overrides), "Failed to reset simulation");
  };

  findPath = (req: Request, res: Response) => {
    const from = parseCoordinate(req.query.from);
    const to = parseCoordinate(req.query.to);
    if (!from || !to) {
      res.status(400).json({ error: "from and to must be given as x,y integer pairs" });
      return;
    }
    res.json({ path: this.service.findPath(from, to) });
  };

  assignRoute = (req: Request, res: Response) => {
    const vehicleId = Number(req.params.id);
    if (!Number.isInteger(vehicleId)) {
      res.status(400).json({ error: "vehicle id must be an integer" });
      return;
    }
    const { destination } = (req.body ?? {}) as { destination?: unknown };
    const target = parsePosition(destination);
    if (!target) {
      res.status(400).json({ error: "destination must be an object with integer x and y" });
      return;
    }
    this.respond(res, () => this.service.assignRoute(vehicleId, target), "Failed to assign route");
  };

  setClock = (req: Request, res: Response) => {
    const { running } = (req.body ?? {}) as { running?: unknown };
    if (typeof running !== "boolean") {
      res.status(400).json({ error: "running must be a boolean" });
      return;
    }
    if (running) {
      this.service.startClock();
    } else {
      this.service.stopClock();
    }
    res.json({ running: this.service.isRunning() });
  };

  private respond(res: Response, action: () => unknown, fallback: string) {
    try {
      res.status(200).json(action());
    } catch (error) {
      const status = errorStatus(error);
      if (status === 500) {
        logger.error(fallback, { error });
      }
      res.status(status).json({ error: status < 500 && error instanceof Error ? error.message : fallback });
    }
  }
}

export const simulationController = new SimulationController();
