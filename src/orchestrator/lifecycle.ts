import type { PunchState, LifecycleStatus } from "./states.js";
import { TERMINAL_STATES, TRANSITIONS, initialStatus } from "./states.js";

export interface TransitionResult {
  correlationId: string;
  previous: PunchState;
  current: PunchState;
  error?: string;
}

export type TransitionObserver = (result: TransitionResult) => void;

/**
 * Drives one identifier through the punch state machine, rejecting any
 * transition the machine does not allow.
 */
export class PunchLifecycle {
  private status: LifecycleStatus = initialStatus();

  constructor(
    readonly correlationId: string,
    private readonly observe?: TransitionObserver,
  ) {}

  get state(): PunchState {
    return this.status.state;
  }

  get attempts(): number {
    return this.status.attempts;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.status.state);
  }

  /** Move to `to`; entering Attempt counts an attempt. */
  advance(to: PunchState, error?: string): TransitionResult {
    const previous = this.status.state;
    if (!TRANSITIONS[previous].includes(to)) {
      throw new Error(
        `Invalid transition for "${this.correlationId}": "${previous}" → "${to}"`,
      );
    }

    this.status.state = to;
    this.status.updatedAt = Date.now();
    if (to === "Attempt") this.status.attempts++;
    if (error !== undefined) this.status.lastError = error;

    const result: TransitionResult = {
      correlationId: this.correlationId,
      previous,
      current: to,
      ...(error !== undefined ? { error } : {}),
    };
    this.observe?.(result);
    return result;
  }
}
