import pino from "pino";
import type {
  ActionExecutor,
  ActionKind,
  ActionOutcome,
  PerformContext,
} from "../../../src/types/index.js";
import { maskIdentifier } from "../../../src/identifier/identifier.js";
import { type Clock, systemClock, formatTime, CHILE_TIME_ZONE } from "../../../src/clock/clock.js";

/**
 * Stands in for the portal in simulation mode: always succeeds, touches
 * nothing.
 */
export class SimulatedExecutor implements ActionExecutor {
  private logger: pino.Logger;

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly timeZone: string = CHILE_TIME_ZONE,
    logger?: pino.Logger,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "punchclock.simulated",
    });
  }

  async perform(
    identifier: string,
    kind: ActionKind,
    context: PerformContext,
  ): Promise<ActionOutcome> {
    const time = formatTime(this.clock.now(), this.timeZone);
    this.logger.info(
      { correlationId: context.correlationId, identifier: maskIdentifier(identifier), kind },
      "Simulated punch",
    );
    return {
      ok: true,
      message: `🧪 Simulation: no ${kind} was made. Chile time ${time} (CLT)`,
    };
  }
}
