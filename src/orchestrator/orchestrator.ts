import { context, type Context, type Span } from "@opentelemetry/api";
import pino from "pino";
import type {
  ActionExecutor,
  ActionKind,
  ActionOutcome,
  EventSink,
  PunchFailureReason,
  PunchResult,
  ReportedActionKind,
} from "../types/index.js";
import { UNKNOWN_ACTION_KIND } from "../types/index.js";
import { isException, maskIdentifier } from "../identifier/identifier.js";
import type { DelayCoordinator } from "../delay/coordinator.js";
import type { CircuitBreaker } from "../resilience/circuit-breaker.js";
import type { RetrySupervisor } from "../resilience/retry.js";
import type { PunchNotifications } from "../notify/messages.js";
import type { MetricsCollector } from "../observability/collector.js";
import type { PunchMetrics } from "../observability/metrics.js";
import type { ProgressReporter, PunchTarget } from "../observability/progress.js";
import {
  startPunchSpan,
  finishPunchSpan,
  startAttemptSpan,
  finishAttemptSpan,
  abortSpan,
} from "../observability/tracer.js";
import { buildEvent } from "../kafka/events.js";
import {
  type Clock,
  type Sleep,
  determineActionKind,
  formatDate,
  formatTime,
} from "../clock/clock.js";
import { PunchLifecycle } from "./lifecycle.js";

export interface OrchestratorDeps {
  breaker: CircuitBreaker;
  delays: DelayCoordinator;
  retry: RetrySupervisor;
  executor: ActionExecutor;
  notifications: PunchNotifications;
  collector: MetricsCollector;
  progress: ProgressReporter;
  clock: Clock;
  sleep: Sleep;
  metrics?: PunchMetrics | null;
  events?: EventSink | null;
  logger?: pino.Logger;
}

export interface OrchestratorOptions {
  runId: string;
  exceptions: readonly string[];
  /** Skip the random delay; the executor is expected to be simulated too */
  simulate: boolean;
  timeZone: string;
}

type Decision =
  | { status: "skipped" }
  | { status: "rejected" }
  | {
      status: "success";
      kind: ActionKind;
      message: string;
      attempts: number;
      delayMinutes?: number;
    }
  | {
      status: "failure";
      kind: ActionKind;
      reason: PunchFailureReason;
      error: string;
      attempts: number;
      attemptLog: string[];
      delayMinutes?: number;
    };

/**
 * Takes one identifier from exception check to notification:
 *
 *   exception? → skip notice
 *   breaker closed? → delay → decide ENTRADA/SALIDA → attempts → notice
 *
 * Exactly one notice (skip, success or failure) is sent per call.
 */
export class PunchOrchestrator {
  private logger: pino.Logger;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.logger = (deps.logger ?? pino({ level: "info" })).child({
      component: "punchclock.orchestrator",
    });
  }

  async process(
    identifier: string,
    correlationId: string,
    parentCtx: Context = context.active(),
  ): Promise<PunchResult> {
    const masked = maskIdentifier(identifier);
    const target: PunchTarget = { correlationId, identifier: masked };
    const log = this.logger.child({ correlationId, identifier: masked });
    const lifecycle = new PunchLifecycle(correlationId, (t) => {
      log.debug({ from: t.previous, to: t.current }, "Punch state transition");
      this.deps.progress.stateChanged(t);
    });
    const startedAt = this.now();
    const { span, ctx } = startPunchSpan(parentCtx, correlationId, masked);

    log.info("Punch started");
    lifecycle.advance("ExceptionCheck");

    let decision: Decision;
    try {
      decision = await this.decide(identifier, target, lifecycle, log, ctx);
    } catch (err) {
      abortSpan(span, err);
      throw err;
    }
    const durationMs = this.now() - startedAt;

    lifecycle.advance("Notify");
    const notified = await this.notify(identifier, masked, decision, durationMs);
    lifecycle.advance("End");

    const result = this.toResult(masked, correlationId, decision, durationMs, notified);
    this.record(result, span);

    log.info(
      { status: result.status, kind: result.kind, attempts: result.attempts, durationMs, notified },
      "Punch finished",
    );
    this.deps.progress.punchFinished(result);
    return result;
  }

  private async decide(
    identifier: string,
    target: PunchTarget,
    lifecycle: PunchLifecycle,
    log: pino.Logger,
    ctx: Context,
  ): Promise<Decision> {
    if (isException(identifier, this.options.exceptions)) {
      lifecycle.advance("Skip");
      log.info("Identifier is on the exception list, skipping");
      return { status: "skipped" };
    }

    lifecycle.advance("CircuitGate");
    if (!this.deps.breaker.canExecute()) {
      lifecycle.advance("Rejected", "circuit breaker open");
      log.error({ breaker: this.deps.breaker.state() }, "Circuit breaker open, not attempting");
      this.deps.collector.recordError();
      return { status: "rejected" };
    }

    this.deps.collector.recordStart();
    let decision: Decision;
    try {
      decision = await this.punch(identifier, target, lifecycle, log, ctx);
    } catch (err) {
      // Past the gate, every punch reports back to the breaker, crashes included.
      this.deps.breaker.recordFailure();
      throw err;
    }

    if (decision.status === "success") {
      this.deps.breaker.recordSuccess();
    } else {
      this.deps.breaker.recordFailure();
    }
    return decision;
  }

  private async punch(
    identifier: string,
    target: PunchTarget,
    lifecycle: PunchLifecycle,
    log: pino.Logger,
    ctx: Context,
  ): Promise<Decision> {
    lifecycle.advance("DelayWait");
    const delayMinutes = await this.applyDelay(identifier, target, log);

    lifecycle.advance("ActionTypeDetermine");
    const kind = determineActionKind(this.deps.clock.now(), this.options.timeZone);
    log.info({ kind }, "Action kind determined");
    this.deps.progress.actionDetermined(target, kind);

    const attemptLog: string[] = [];
    const outcome = await this.deps.retry.run(
      async (attempt) => {
        lifecycle.advance("Attempt");
        const { span } = startAttemptSpan(ctx, attempt, kind);
        let result: ActionOutcome;
        try {
          result = await this.deps.executor.perform(identifier, kind, {
            correlationId: target.correlationId,
          });
        } catch (err) {
          abortSpan(span, err);
          throw err;
        }
        finishAttemptSpan(span, result);
        return result;
      },
      (attempt) => {
        this.deps.metrics?.attemptDuration(attempt.durationMs, { outcome: attempt.outcome, kind });
        this.deps.progress.attemptFinished(target, attempt);
        if (attempt.outcome !== "success") {
          attemptLog.push(
            `Attempt ${attempt.index}/${attempt.maxAttempts} at ${formatTime(new Date(attempt.startedAt), this.options.timeZone)} ` +
              `failed after ${attempt.durationMs}ms [${attempt.category}]: ${attempt.error}`,
          );
          log.warn(
            { attempt: attempt.index, maxAttempts: attempt.maxAttempts, category: attempt.category, err: attempt.error },
            "Attempt failed",
          );
        }
      },
    );

    const attempts = outcome.attempts.length;
    const delay = delayMinutes === undefined ? {} : { delayMinutes };

    if (outcome.ok) {
      lifecycle.advance("Success");
      return { status: "success", kind, message: outcome.message, attempts, ...delay };
    }

    lifecycle.advance("FatalFailure", outcome.error);
    return {
      status: "failure",
      kind,
      reason: outcome.category,
      error: outcome.error,
      attempts,
      attemptLog,
      ...delay,
    };
  }

  private async applyDelay(
    identifier: string,
    target: PunchTarget,
    log: pino.Logger,
  ): Promise<number | undefined> {
    if (this.options.simulate) {
      log.info("Simulation mode, no delay");
      return undefined;
    }

    const collisions = this.deps.delays.statistics().collisions;
    const minutes = this.deps.delays.assign(identifier);
    if (this.deps.delays.statistics().collisions > collisions) {
      this.deps.metrics?.delayCollisions();
    }
    this.deps.collector.recordDelay();
    this.deps.metrics?.delayMinutes(minutes);
    this.deps.progress.delayApplied(target, minutes);
    log.info({ minutes }, "Waiting before punching");
    await this.deps.sleep(minutes * 60_000);
    return minutes;
  }

  private async notify(
    identifier: string,
    masked: string,
    decision: Decision,
    durationMs: number,
  ): Promise<boolean> {
    const n = this.deps.notifications;
    switch (decision.status) {
      case "skipped":
        return n.skipped(identifier, masked, this.localTimestamp());
      case "rejected":
        return n.failed(
          identifier,
          masked,
          UNKNOWN_ACTION_KIND,
          "Circuit breaker open: too many consecutive failures, attempt not made",
          [],
        );
      case "success":
        return n.succeeded(identifier, masked, decision.kind, decision.message, durationMs);
      case "failure":
        return n.failed(identifier, masked, decision.kind, decision.error, decision.attemptLog);
    }
  }

  private toResult(
    masked: string,
    correlationId: string,
    decision: Decision,
    durationMs: number,
    notified: boolean,
  ): PunchResult {
    const base = { identifier: masked, correlationId, durationMs, notified };
    switch (decision.status) {
      case "skipped":
        return { ...base, status: "skipped", attempts: 0 };
      case "rejected":
        return {
          ...base,
          status: "failure",
          attempts: 0,
          reason: "circuit-open",
          error: "circuit breaker open",
        };
      case "success":
        return {
          ...base,
          status: "success",
          kind: decision.kind,
          attempts: decision.attempts,
          ...(decision.delayMinutes === undefined ? {} : { delayMinutes: decision.delayMinutes }),
        };
      case "failure":
        return {
          ...base,
          status: "failure",
          kind: decision.kind,
          attempts: decision.attempts,
          reason: decision.reason,
          error: decision.error,
          ...(decision.delayMinutes === undefined ? {} : { delayMinutes: decision.delayMinutes }),
        };
    }
  }

  private record(result: PunchResult, span: Span): void {
    if (result.status === "success") {
      this.deps.collector.recordSuccess(result.durationMs);
    } else if (result.status === "failure" && result.reason !== "circuit-open") {
      this.deps.collector.recordError();
    }

    const reported: ReportedActionKind = result.kind ?? UNKNOWN_ACTION_KIND;
    this.deps.metrics?.punchCount({ status: result.status, kind: reported });

    const type =
      result.status === "success"
        ? "punch.succeeded"
        : result.status === "failure"
          ? "punch.failed"
          : "punch.skipped";
    this.deps.events?.emit(
      buildEvent(
        type,
        { runId: this.options.runId, correlationId: result.correlationId },
        {
          identifier: result.identifier,
          kind: reported,
          attempts: result.attempts,
          durationMs: result.durationMs,
          ...(result.reason ? { reason: result.reason } : {}),
        },
        span,
      ),
    );

    finishPunchSpan(span, result);
  }

  private localTimestamp(): string {
    const now = this.deps.clock.now();
    return `${formatDate(now, this.options.timeZone)} ${formatTime(now, this.options.timeZone)}`;
  }

  private now(): number {
    return this.deps.clock.now().getTime();
  }
}
