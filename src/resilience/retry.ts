import pino from "pino";
import type {
  ActionOutcome,
  ExecutionAttempt,
  FailureCategory,
} from "../types/index.js";
import type { ExecutionPolicy } from "../policy/policy.js";
import { sleep as defaultSleep, type Sleep } from "../clock/clock.js";

export type SupervisedResult =
  | { ok: true; message: string; attempts: ExecutionAttempt[] }
  | { ok: false; category: FailureCategory; error: string; attempts: ExecutionAttempt[] };

export type AttemptObserver = (attempt: ExecutionAttempt) => void;

export interface RetrySupervisorOptions {
  sleep?: Sleep;
  now?: () => number;
  logger?: pino.Logger;
}

/**
 * Runs an action up to `policy.maxAttempts` times with a fixed pause in
 * between. The circuit breaker is not consulted between attempts.
 */
export class RetrySupervisor {
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private logger: pino.Logger;

  constructor(
    private readonly policy: ExecutionPolicy,
    options: RetrySupervisorOptions = {},
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? pino({ level: "info" })).child({
      component: "punchclock.retry",
    });
  }

  async run(
    action: (attempt: number) => Promise<ActionOutcome>,
    observe?: AttemptObserver,
  ): Promise<SupervisedResult> {
    const maxAttempts = this.policy.maxAttempts;
    const attempts: ExecutionAttempt[] = [];
    let last: { category: FailureCategory; error: string } = {
      category: "unexpected",
      error: "No attempt was made",
    };

    for (let index = 1; index <= maxAttempts; index++) {
      const startedAt = this.now();
      const outcome = await this.invoke(action, index);
      const durationMs = this.now() - startedAt;

      if (outcome.ok) {
        const attempt: ExecutionAttempt = {
          index,
          maxAttempts,
          startedAt,
          outcome: "success",
          durationMs,
        };
        attempts.push(attempt);
        observe?.(attempt);
        return { ok: true, message: outcome.message, attempts };
      }

      const retrying = this.policy.shouldRetry(index);
      const attempt: ExecutionAttempt = {
        index,
        maxAttempts,
        startedAt,
        outcome: retrying ? "retryable-failure" : "fatal-failure",
        durationMs,
        category: outcome.category,
        error: outcome.error,
      };
      attempts.push(attempt);
      observe?.(attempt);
      last = { category: outcome.category, error: outcome.error };

      if (!retrying) break;

      const backoff = this.policy.backoffMs();
      this.logger.warn(
        { attempt: index, maxAttempts, category: outcome.category, backoffMs: backoff },
        "Attempt failed, retrying",
      );
      await this.sleep(backoff);
    }

    return { ok: false, ...last, attempts };
  }

  private async invoke(
    action: (attempt: number) => Promise<ActionOutcome>,
    index: number,
  ): Promise<ActionOutcome> {
    try {
      return await action(index);
    } catch (err) {
      return {
        ok: false,
        category: "unexpected",
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
