import pino from "pino";
import type {
  BreakerSnapshot,
  BreakerState,
  BreakerTransition,
} from "../types/index.js";

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit */
  threshold: number;
  /** Time the circuit stays open before a probe is allowed */
  resetTimeoutMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerConfig = {
  threshold: 3,
  resetTimeoutMs: 60 * 1000,
};

export type TransitionListener = (transition: BreakerTransition) => void;

/**
 * Run-scoped circuit breaker shared by every identifier of one run.
 *
 *   Closed   --(failures >= threshold)-->  Open
 *   Open     --(resetTimeout elapsed)--->  HalfOpen   (on canExecute)
 *   HalfOpen --(success)---------------->  Closed
 *   HalfOpen --(failure)---------------->  Open
 *
 * Methods are synchronous, so each read-then-transition is atomic with
 * respect to other identifiers in flight.
 */
export class CircuitBreaker {
  private current: BreakerState = "Closed";
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;
  private readonly listeners: TransitionListener[] = [];
  private logger: pino.Logger;

  constructor(
    config?: Partial<CircuitBreakerConfig>,
    private readonly now: () => number = Date.now,
    logger?: pino.Logger,
  ) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER, ...config };
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "punchclock.breaker",
    });
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  /** Gate check made once before an identifier is attempted. */
  canExecute(): boolean {
    switch (this.current) {
      case "Closed":
      case "HalfOpen":
        return true;
      case "Open": {
        const since = this.lastFailureTime === null
          ? Infinity
          : this.now() - this.lastFailureTime;
        if (since > this.config.resetTimeoutMs) {
          this.transition("HalfOpen");
          return true;
        }
        return false;
      }
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    if (this.current !== "Closed") this.transition("Closed");
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.failureCount >= this.config.threshold && this.current !== "Open") {
      this.transition("Open");
    } else {
      this.logger.debug(
        { failures: this.failureCount, threshold: this.config.threshold },
        "Failure recorded",
      );
    }
  }

  state(): BreakerSnapshot {
    return {
      state: this.current,
      failureCount: this.failureCount,
      threshold: this.config.threshold,
      resetTimeoutMs: this.config.resetTimeoutMs,
      lastFailureTime:
        this.lastFailureTime === null ? null : new Date(this.lastFailureTime).toISOString(),
    };
  }

  private transition(to: BreakerState): void {
    const from = this.current;
    this.current = to;

    const transition: BreakerTransition = { from, to, failureCount: this.failureCount };
    if (to === "Open") {
      this.logger.error(transition, "Circuit OPEN");
    } else {
      this.logger.info(transition, `Circuit ${to}`);
    }

    for (const listener of this.listeners) {
      listener(transition);
    }
  }
}
