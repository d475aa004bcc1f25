import type {
  ActionKind,
  ExecutionAttempt,
  PunchResult,
  RunStatistics,
} from "../types/index.js";
import type { MetricsSummary } from "./collector.js";
import type { TransitionResult } from "../orchestrator/lifecycle.js";

export interface PunchTarget {
  correlationId: string;
  identifier: string;
}

export interface RunBanner {
  runId: string;
  identifiers: string[];
  primary: string;
  secondary?: string;
  startedAt: string;
  mode: string;
  maxWorkers: number;
  simulate: boolean;
}

/**
 * Human-readable progress lines, separate from the structured log.
 */
export interface ProgressReporter {
  runStarted(banner: RunBanner): void;
  stateChanged(result: TransitionResult): void;
  delayApplied(target: PunchTarget, minutes: number): void;
  actionDetermined(target: PunchTarget, kind: ActionKind): void;
  attemptFinished(target: PunchTarget, attempt: ExecutionAttempt): void;
  punchFinished(result: PunchResult): void;
  runFinished(stats: RunStatistics, summary?: MetricsSummary): void;
  notice(message: string): void;
}

const RULE = "=".repeat(60);

export class ConsoleReporter implements ProgressReporter {
  runStarted(banner: RunBanner): void {
    console.log(RULE);
    console.log(`[run:${banner.runId}] punching ${banner.identifiers.length} identifier(s)`);
    console.log(`  identifiers: ${banner.identifiers.join(", ")}`);
    console.log(`  primary address: ${banner.primary}`);
    console.log(`  secondary address: ${banner.secondary ?? "not configured"}`);
    console.log(`  mode: ${banner.mode} (${banner.maxWorkers} workers)${banner.simulate ? " [SIMULATION]" : ""}`);
    console.log(`  started at: ${banner.startedAt} (CLT)`);
    console.log(RULE);
  }

  stateChanged(result: TransitionResult): void {
    if (result.current === "Rejected" || result.current === "Skip") {
      console.log(`[punch:${result.correlationId}] ${result.previous} → ${result.current}`);
    }
  }

  delayApplied(target: PunchTarget, minutes: number): void {
    console.log(`[punch:${target.correlationId}] ${target.identifier} waiting ${minutes} min`);
  }

  actionDetermined(target: PunchTarget, kind: ActionKind): void {
    console.log(`[punch:${target.correlationId}] ${target.identifier} action ${kind}`);
  }

  attemptFinished(target: PunchTarget, attempt: ExecutionAttempt): void {
    const status = attempt.outcome === "success" ? "ok" : "FAIL";
    console.log(
      `[punch:${target.correlationId}] attempt ${attempt.index}/${attempt.maxAttempts} ${status} (${attempt.durationMs}ms)` +
        (attempt.error ? ` ${attempt.category}: ${attempt.error}` : ""),
    );
  }

  punchFinished(result: PunchResult): void {
    const label = {
      success: "completed",
      failure: "FAILED",
      skipped: "skipped",
    }[result.status];
    console.log(
      `[punch:${result.correlationId}] ${result.identifier} ${label}` +
        (result.error ? ` (${result.error})` : ""),
    );
  }

  runFinished(stats: RunStatistics, summary?: MetricsSummary): void {
    console.log(RULE);
    console.log("FINAL STATISTICS");
    console.log(`  identifiers: ${stats.total}`);
    console.log(`  successes: ${stats.successes}`);
    console.log(`  errors: ${stats.errors}`);
    console.log(`  skipped: ${stats.skipped}`);
    console.log(`  success rate: ${(stats.successRate * 100).toFixed(1)}%`);
    console.log(`  delay collisions: ${stats.collisions}`);
    if (summary) {
      console.log(`  total execution time: ${(summary.totalExecutionMs / 1000).toFixed(2)}s`);
      console.log(`  average per identifier: ${(summary.averageDurationMs / 1000).toFixed(2)}s`);
      console.log(`  delays applied: ${summary.delaysApplied}`);
    }
    console.log(`  circuit breaker: ${stats.breaker.state} (failures: ${stats.breaker.failureCount})`);
    console.log(RULE);
  }

  notice(message: string): void {
    console.log(message);
  }
}
