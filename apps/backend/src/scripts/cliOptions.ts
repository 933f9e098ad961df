import { env } from "../config/env";
import type { RoadLayout, SimulationConfig } from "../models/simulation";

export interface CliOptions {
  config: SimulationConfig;
  steps: number;
  delayMs: number;
  json: boolean;
}

const DEFAULT_STEPS = 20;
const DEFAULT_DELAY_MS = 200;

export const parseArgs = (args: string[]): CliOptions => {
  const options: CliOptions = {
    config: {
      gridSize: env.simulation.gridSize,
      vehicleCount: env.simulation.vehicleCount,
      intersectionCycleLength: env.simulation.intersectionCycleLength,
      seed: env.simulation.seed,
      roadLayout: env.simulation.roadLayout,
    },
    steps: DEFAULT_STEPS,
    delayMs: DEFAULT_DELAY_MS,
    json: false,
  };
  const requireValue = (flag: string, value: string | undefined) => {
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for --${flag}`);
    }
    return value;
  };
  const requireInteger = (flag: string, value: string | undefined) => {
    const parsed = Number(requireValue(flag, value));
    if (!Number.isInteger(parsed)) {
      throw new Error(`--${flag} expects an integer`);
    }
    return parsed;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }
    const key = arg.slice(2);
    switch (key) {
      case "grid":
        options.config.gridSize = requireInteger(key, args[i + 1]);
        i += 1;
        break;
      case "cars":
        options.config.vehicleCount = requireInteger(key, args[i + 1]);
        i += 1;
        break;
      case "cycle":
        options.config.intersectionCycleLength = requireInteger(key, args[i + 1]);
        i += 1;
        break;
      case "seed":
        options.config.seed = requireInteger(key, args[i + 1]);
        i += 1;
        break;
      case "steps":
        options.steps = requireInteger(key, args[i + 1]);
        i += 1;
        break;
      case "delay":
        options.delayMs = requireInteger(key, args[i + 1]);
        i += 1;
        break;
      case "layout": {
        const value = requireValue(key, args[i + 1]);
        if (value !== "grid" && value !== "lattice") {
          throw new Error("--layout must be grid or lattice");
        }
        const layout: RoadLayout = value;
        options.config.roadLayout = layout;
        i += 1;
        break;
      }
      case "json":
        options.json = true;
        break;
      default:
        throw new Error(`Unknown option --${key}`);
    }
  }

  if (options.steps < 0 || options.delayMs < 0) {
    throw new Error("--steps and --delay must not be negative");
  }

  return options;
};
