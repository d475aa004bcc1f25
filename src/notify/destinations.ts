import { sameIdentifier } from "../identifier/identifier.js";
import type { NotificationConfig } from "../types/index.js";

/**
 * Decides who hears about what:
 * - the primary address receives every notification;
 * - the secondary address only receives notices for its bound identifier,
 *   plus holiday notices;
 * - in simulation mode only the primary address receives anything.
 */
export class DestinationResolver {
  constructor(
    private readonly config: Pick<NotificationConfig, "primary" | "secondary">,
    private readonly simulate: boolean,
  ) {}

  forIdentifier(identifier: string): string[] {
    const destinations = [this.config.primary];
    const secondary = this.config.secondary;
    if (!this.simulate && secondary && sameIdentifier(identifier, secondary.identifier)) {
      destinations.push(secondary.address);
    }
    return unique(destinations);
  }

  forBroadcast(): string[] {
    const destinations = [this.config.primary];
    if (!this.simulate && this.config.secondary) {
      destinations.push(this.config.secondary.address);
    }
    return unique(destinations);
  }
}

function unique(addresses: string[]): string[] {
  return [...new Set(addresses.map((a) => a.trim()))];
}
