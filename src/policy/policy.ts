import type { ExecutionConfig } from "../types/index.js";

export type ExecutionPolicyConfig = Pick<
  ExecutionConfig,
  "maxWorkers" | "retryAttempts" | "retryDelaySeconds"
>;

/**
 * Evaluates execution and retry settings to make scheduling decisions.
 */
export class ExecutionPolicy {
  constructor(private readonly config: ExecutionPolicyConfig) {}

  /** Whether another identifier can be started alongside `currentRunning`. */
  canSchedule(currentRunning: number): boolean {
    return currentRunning < this.config.maxWorkers;
  }

  /** First attempt plus configured retries. */
  get maxAttempts(): number {
    return this.config.retryAttempts + 1;
  }

  /** Whether another attempt follows a failed 1-based `attempt`. */
  shouldRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }

  /** Fixed pause between attempts. */
  backoffMs(): number {
    return this.config.retryDelaySeconds * 1000;
  }

  get maxWorkers(): number {
    return this.config.maxWorkers;
  }
}
