import { setTimeout as sleep } from "timers/promises";
import { SimulationEngine, renderGrid } from "../sim";
import { logger } from "../utils/logger";
import { parseArgs } from "./cliOptions";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

const main = async () => {
  const options = parseArgs(process.argv.slice(2));
  const engine = SimulationEngine.initialize(options.config);

  for (let i = 0; i < options.steps; i += 1) {
    engine.step();
    const snapshot = engine.snapshot();
    if (options.json) {
      process.stdout.write(`${JSON.stringify(snapshot)}\n`);
      continue;
    }
    process.stdout.write(`${CLEAR_SCREEN}Step ${snapshot.timeStep}:\n\n${renderGrid(snapshot)}\n\n`);
    if (options.delayMs > 0) {
      await sleep(options.delayMs);
    }
  }
};

if (require.main === module) {
  void main().catch((error: unknown) => {
    logger.error("Simulation run failed", { error });
    process.exitCode = 1;
  });
}
