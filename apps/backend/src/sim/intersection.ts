import type {
  Heading,
  IntersectionSnapshot,
  LightState,
  Position,
} from "../models/simulation";
import { InvalidConfigurationError } from "./errors";
import { headingAxis, isHeading } from "./heading";
import { clonePosition } from "./position";

export const DEFAULT_CYCLE_LENGTH = 5;

const DEFAULT_LIGHT_STATE: LightState = { NS: "green", EW: "red" };

export interface IntersectionOptions {
  cycleLength?: number;
  initialState?: LightState;
}

/**
 * Two-phase traffic light on a single control cell. Exactly one axis is green; the
 * phases swap every `cycleLength` calls to `advance()`.
 */
export class Intersection {
  readonly position: Position;
  readonly cycleLength: number;
  private lightState: LightState;
  private timerValue = 0;

  constructor(position: Position, options: IntersectionOptions = {}) {
    const cycleLength = options.cycleLength ?? DEFAULT_CYCLE_LENGTH;
    if (!Number.isInteger(cycleLength) || cycleLength < 1) {
      throw new InvalidConfigurationError(
        `Intersection cycle length must be a positive integer, received ${cycleLength}`,
      );
    }
    const initialState = options.initialState ?? DEFAULT_LIGHT_STATE;
    if ((initialState.NS === "green") === (initialState.EW === "green")) {
      throw new InvalidConfigurationError("Exactly one light axis must start green");
    }

    this.position = clonePosition(position);
    this.cycleLength = cycleLength;
    this.lightState = { ...initialState };
  }

  get timer(): number {
    return this.timerValue;
  }

  get state(): LightState {
    return { ...this.lightState };
  }

  advance() {
    this.timerValue += 1;
    if (this.timerValue < this.cycleLength) return;

    this.lightState =
      this.lightState.NS === "green" ? { NS: "red", EW: "green" } : { NS: "green", EW: "red" };
    this.timerValue = 0;
  }

  isGreenFor(heading: Heading): boolean {
    // Headings can arrive from untyped callers (HTTP bodies, JSON fixtures).
    if (!isHeading(heading)) return false;
    return this.lightState[headingAxis(heading)] === "green";
  }

  toSnapshot(): IntersectionSnapshot {
    return {
      position: clonePosition(this.position),
      NS: this.lightState.NS,
      EW: this.lightState.EW,
    };
  }
}
