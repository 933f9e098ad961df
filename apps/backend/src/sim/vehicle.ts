import type { Heading, Position, VehicleSnapshot } from "../models/simulation";
import { InvalidConfigurationError } from "./errors";
import { headingBetween, offset } from "./heading";
import { clonePosition, samePosition } from "./position";

export class Vehicle {
  readonly id: number;
  private currentPosition: Position;
  private currentHeading: Heading;
  private destinationValue: Position | undefined;
  private route: Position[] = [];
  // Index into `route` of the waypoint the vehicle is expected to occupy.
  private routeCursor = 0;

  constructor(id: number, position: Position, heading: Heading) {
    this.id = id;
    this.currentPosition = clonePosition(position);
    this.currentHeading = heading;
  }

  get position(): Position {
    return clonePosition(this.currentPosition);
  }

  get heading(): Heading {
    return this.currentHeading;
  }

  get destination(): Position | undefined {
    return this.destinationValue ? clonePosition(this.destinationValue) : undefined;
  }

  get remainingRoute(): Position[] {
    return this.route.slice(this.routeCursor).map(clonePosition);
  }

  assignRoute(route: readonly Position[]) {
    const [first] = route;
    const last = route[route.length - 1];
    if (!first || !last) {
      this.route = [];
      this.routeCursor = 0;
      this.destinationValue = undefined;
      return;
    }
    if (!samePosition(first, this.currentPosition)) {
      throw new InvalidConfigurationError(
        `Route for vehicle ${this.id} must start at (${this.currentPosition.x},${this.currentPosition.y})`,
      );
    }
    this.route = route.map(clonePosition);
    this.routeCursor = 0;
    this.destinationValue = clonePosition(last);
  }

  /**
   * Turns toward the following waypoint when the vehicle sits on its current one.
   * Without a route, or on the final waypoint, the heading is kept.
   */
  chooseNextHeading() {
    const waypoint = this.route[this.routeCursor];
    const following = this.route[this.routeCursor + 1];
    if (!waypoint || !following || !samePosition(waypoint, this.currentPosition)) return;

    const heading = headingBetween(waypoint, following);
    if (heading) {
      this.currentHeading = heading;
    }
  }

  peekNextPosition(): Position {
    return offset(this.currentPosition, this.currentHeading);
  }

  commitMove(newPosition: Position) {
    this.currentPosition = clonePosition(newPosition);
    const following = this.route[this.routeCursor + 1];
    if (following && samePosition(following, newPosition)) {
      this.routeCursor += 1;
    }
  }

  toSnapshot(): VehicleSnapshot {
    const snapshot: VehicleSnapshot = {
      id: this.id,
      position: clonePosition(this.currentPosition),
      heading: this.currentHeading,
    };
    if (this.destinationValue) {
      snapshot.destination = clonePosition(this.destinationValue);
    }
    return snapshot;
  }
}
