import pino from "pino";
import { maskIdentifier } from "../identifier/identifier.js";

export const MIN_DELAY_MINUTES = 1;
export const MAX_DELAY_MINUTES = 20;
export const MAX_DRAWS = 10;

export type RandomSource = () => number;

export interface DelayStatistics {
  count: number;
  collisions: number;
  /** Identifier → assigned minutes; a copy */
  assignments: Record<string, number>;
}

/**
 * Hands each identifier in a run a random wait in minutes, redrawing when
 * the value is already taken by another identifier of the same run.
 *
 * `assign` only decides; the caller sleeps. The whole read-check-write
 * runs synchronously, so concurrent identifiers on the event loop cannot
 * interleave inside it.
 */
export class DelayCoordinator {
  private assignments = new Map<string, number>();
  private collisions = 0;
  private logger: pino.Logger;

  constructor(
    private readonly random: RandomSource = Math.random,
    logger?: pino.Logger,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "punchclock.delay",
    });
  }

  assign(identifier: string): number {
    const taken = new Set(this.assignments.values());
    let minutes = this.draw();
    let draws = 1;

    while (taken.has(minutes) && draws < MAX_DRAWS) {
      this.logger.debug(
        { minutes, draw: draws, maxDraws: MAX_DRAWS },
        "Delay collision, drawing again",
      );
      minutes = this.draw();
      draws++;
    }

    if (taken.has(minutes)) {
      this.collisions++;
      this.logger.warn(
        { identifier: maskIdentifier(identifier), minutes, draws },
        "Could not avoid delay collision, accepting it",
      );
    }

    this.assignments.set(identifier, minutes);
    this.logger.info(
      { identifier: maskIdentifier(identifier), minutes },
      "Random delay assigned",
    );
    return minutes;
  }

  statistics(): DelayStatistics {
    return {
      count: this.assignments.size,
      collisions: this.collisions,
      assignments: Object.fromEntries(this.assignments),
    };
  }

  private draw(): number {
    const span = MAX_DELAY_MINUTES - MIN_DELAY_MINUTES + 1;
    return MIN_DELAY_MINUTES + Math.floor(this.random() * span);
  }
}
