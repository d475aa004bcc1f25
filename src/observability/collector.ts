export interface MetricsSummary {
  processed: number;
  successes: number;
  errors: number;
  successRate: number;
  delaysApplied: number;
  averageDurationMs: number;
  totalExecutionMs: number;
}

/**
 * In-process counters for the end-of-run summary. Increments are plain
 * synchronous updates on the event loop.
 */
export class MetricsCollector {
  private processed = 0;
  private successes = 0;
  private errors = 0;
  private delaysApplied = 0;
  private successDurationMs = 0;
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  recordStart(): void {
    this.processed++;
  }

  recordSuccess(durationMs: number): void {
    this.successes++;
    this.successDurationMs += durationMs;
  }

  recordError(): void {
    this.errors++;
  }

  recordDelay(): void {
    this.delaysApplied++;
  }

  summary(): MetricsSummary {
    return {
      processed: this.processed,
      successes: this.successes,
      errors: this.errors,
      successRate: this.processed > 0 ? this.successes / this.processed : 0,
      delaysApplied: this.delaysApplied,
      averageDurationMs: this.successes > 0 ? this.successDurationMs / this.successes : 0,
      totalExecutionMs: this.now() - this.startedAt,
    };
  }
}
