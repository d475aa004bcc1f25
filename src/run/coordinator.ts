import { context, type Context } from "@opentelemetry/api";
import pino from "pino";
import type {
  ActionExecutor,
  BreakerTransition,
  EventSink,
  PunchclockConfig,
  PunchResult,
  RunStatistics,
} from "../types/index.js";
import { maskIdentifier } from "../identifier/identifier.js";
import { DelayCoordinator, type RandomSource } from "../delay/coordinator.js";
import { CircuitBreaker } from "../resilience/circuit-breaker.js";
import { RetrySupervisor } from "../resilience/retry.js";
import { ExecutionPolicy } from "../policy/policy.js";
import { MetricsCollector, type MetricsSummary } from "../observability/collector.js";
import type { PunchMetrics } from "../observability/metrics.js";
import type { ProgressReporter } from "../observability/progress.js";
import type { PunchNotifications } from "../notify/messages.js";
import { buildEvent } from "../kafka/events.js";
import type { Clock, Sleep } from "../clock/clock.js";
import { PunchOrchestrator } from "../orchestrator/orchestrator.js";

export interface RunCoordinatorDeps {
  executor: ActionExecutor;
  notifications: PunchNotifications;
  progress: ProgressReporter;
  clock: Clock;
  sleep: Sleep;
  random?: RandomSource;
  metrics?: PunchMetrics | null;
  events?: EventSink | null;
  logger?: pino.Logger;
}

export interface RunOutcome {
  results: PunchResult[];
  statistics: RunStatistics;
  summary: MetricsSummary;
}

/**
 * Fans one run out over every configured identifier. Each run gets its
 * own breaker, delay slots and collector; the breaker is shared by all
 * identifiers of the run.
 */
export class RunCoordinator {
  private logger: pino.Logger;
  private readonly policy: ExecutionPolicy;

  constructor(
    private readonly config: PunchclockConfig,
    private readonly deps: RunCoordinatorDeps,
  ) {
    this.logger = (deps.logger ?? pino({ level: "info" })).child({
      component: "punchclock.run",
    });
    this.policy = new ExecutionPolicy(config.execution);
  }

  /** Concurrent only when there is more than one identifier to share the pool. */
  get concurrent(): boolean {
    return this.config.execution.mode === "concurrent" && this.config.identifiers.length > 1;
  }

  async coordinate(runId: string, parentCtx: Context = context.active()): Promise<RunOutcome> {
    const { execution } = this.config;
    const now = (): number => this.deps.clock.now().getTime();

    const breaker = new CircuitBreaker(
      {
        threshold: execution.breakerThreshold,
        resetTimeoutMs: execution.breakerResetSeconds * 1000,
      },
      now,
      this.deps.logger,
    );
    breaker.onTransition((t) => this.onBreakerTransition(runId, t));

    const delays = new DelayCoordinator(this.deps.random, this.deps.logger);
    const collector = new MetricsCollector(now);
    const retry = new RetrySupervisor(this.policy, {
      sleep: this.deps.sleep,
      now,
      logger: this.deps.logger,
    });

    const orchestrator = new PunchOrchestrator(
      {
        breaker,
        delays,
        retry,
        collector,
        executor: this.deps.executor,
        notifications: this.deps.notifications,
        progress: this.deps.progress,
        clock: this.deps.clock,
        sleep: this.deps.sleep,
        metrics: this.deps.metrics ?? null,
        events: this.deps.events ?? null,
        logger: this.deps.logger,
      },
      {
        runId,
        exceptions: this.config.exceptions,
        simulate: this.config.simulate,
        timeZone: this.config.timeZone,
      },
    );

    const identifiers = this.config.identifiers;
    const task = (index: number): Promise<PunchResult> => {
      const identifier = identifiers[index] ?? "";
      const correlationId = `${runId}-${index + 1}`;
      return this.guarded(identifier, correlationId, () =>
        orchestrator.process(identifier, correlationId, parentCtx),
      );
    };

    this.logger.info(
      {
        runId,
        identifiers: identifiers.length,
        mode: this.concurrent ? "concurrent" : "sequential",
        maxWorkers: this.policy.maxWorkers,
      },
      "Run started",
    );

    const results = this.concurrent
      ? await this.runConcurrently(identifiers.length, task)
      : await this.runSequentially(identifiers.length, task);

    const crashed = results.filter((r) => r.reason === "crashed").length;
    for (let i = 0; i < crashed; i++) collector.recordError();

    const summary = collector.summary();
    const statistics = this.buildStatistics(results, delays, breaker, summary);
    this.logger.info({ runId, statistics }, "Run finished");
    return { results, statistics, summary };
  }

  private async runSequentially(
    count: number,
    task: (index: number) => Promise<PunchResult>,
  ): Promise<PunchResult[]> {
    const results: PunchResult[] = [];
    for (let i = 0; i < count; i++) {
      results.push(await task(i));
    }
    return results;
  }

  /**
   * Bounded pool: a new identifier starts whenever the policy allows one
   * more alongside those running. Results keep identifier order.
   */
  private async runConcurrently(
    count: number,
    task: (index: number) => Promise<PunchResult>,
  ): Promise<PunchResult[]> {
    const results = new Map<number, PunchResult>();
    const running = new Set<Promise<void>>();

    for (let i = 0; i < count; i++) {
      while (!this.policy.canSchedule(running.size)) {
        await Promise.race(running);
      }
      const slot: Promise<void> = task(i).then((result) => {
        results.set(i, result);
        running.delete(slot);
      });
      running.add(slot);
    }

    await Promise.all(running);
    return [...results.entries()].sort(([a], [b]) => a - b).map(([, r]) => r);
  }

  /** Contains anything an orchestrator throws so sibling identifiers carry on. */
  private async guarded(
    identifier: string,
    correlationId: string,
    fn: () => Promise<PunchResult>,
  ): Promise<PunchResult> {
    const started = this.deps.clock.now().getTime();
    try {
      return await fn();
    } catch (err) {
      const masked = maskIdentifier(identifier);
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ err, correlationId, identifier: masked }, "Punch crashed");
      const result: PunchResult = {
        identifier: masked,
        correlationId,
        status: "failure",
        attempts: 0,
        durationMs: this.deps.clock.now().getTime() - started,
        reason: "crashed",
        error: message,
        notified: false,
      };
      this.deps.progress.punchFinished(result);
      return result;
    }
  }

  private buildStatistics(
    results: readonly PunchResult[],
    delays: DelayCoordinator,
    breaker: CircuitBreaker,
    summary: MetricsSummary,
  ): RunStatistics {
    const total = results.length;
    const successes = results.filter((r) => r.status === "success").length;
    const errors = results.filter((r) => r.status === "failure").length;
    const skipped = results.filter((r) => r.status === "skipped").length;

    const durations: Record<string, number> = {};
    for (const r of results) durations[r.correlationId] = r.durationMs;

    return {
      total,
      successes,
      errors,
      skipped,
      successRate: total > 0 ? successes / total : 0,
      collisions: delays.statistics().collisions,
      delaysApplied: summary.delaysApplied,
      averageDurationMs: summary.averageDurationMs,
      totalDurationMs: summary.totalExecutionMs,
      durations,
      breaker: breaker.state(),
    };
  }

  private onBreakerTransition(runId: string, transition: BreakerTransition): void {
    this.logger.warn(transition, "Circuit breaker transition");
    this.deps.metrics?.breakerTransitions({ from: transition.from, to: transition.to });
    this.deps.events?.emit(
      buildEvent("breaker.transition", { runId }, { ...transition }),
    );
  }
}
