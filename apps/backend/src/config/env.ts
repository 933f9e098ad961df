import dotenv from "dotenv";
import type { RoadLayout } from "../models/simulation";

dotenv.config();

const DEFAULT_PORT = 4000;

const optional = (value?: string | null) => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const integer = (value: string | undefined, fallback: number) => {
  const raw = optional(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : fallback;
};

const flag = (value: string | undefined, fallback: boolean) => {
  const raw = optional(value)?.toLowerCase();
  if (raw === undefined) return fallback;
  return raw === "1" || raw === "true" || raw === "yes";
};

const roadLayout = (value: string | undefined): RoadLayout =>
  optional(value) === "lattice" ? "lattice" : "grid";

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: integer(process.env.PORT, DEFAULT_PORT),
  simulation: {
    gridSize: integer(process.env.SIM_GRID_SIZE, 10),
    vehicleCount: integer(process.env.SIM_VEHICLE_COUNT, 5),
    intersectionCycleLength: integer(process.env.SIM_CYCLE_LENGTH, 5),
    seed: integer(process.env.SIM_SEED, 42),
    roadLayout: roadLayout(process.env.SIM_ROAD_LAYOUT),
    tickMs: integer(process.env.SIM_TICK_MS, 500),
    autoRun: flag(process.env.SIM_AUTO_RUN, false),
  },
};
