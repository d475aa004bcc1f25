import { nanoid } from "nanoid";
import pino from "pino";
import type {
  ActionExecutor,
  EventSink,
  PunchclockConfig,
  RunReport,
} from "./types/index.js";
import { maskIdentifier } from "./identifier/identifier.js";
import { type Clock, type Sleep, systemClock, sleep, formatDate, formatTime } from "./clock/clock.js";
import type { RandomSource } from "./delay/coordinator.js";
import { HolidayService, type HolidayCalendar } from "./holiday/holiday.js";
import {
  EmailNotifier,
  DestinationResolver,
  PunchNotifications,
  type Notifier,
} from "./notify/index.js";
import { EventProducer } from "./kafka/producer.js";
import { buildEvent } from "./kafka/events.js";
import { RunCoordinator } from "./run/coordinator.js";
import {
  startTracing,
  stopTracing,
  initMetrics,
  shutdownMetrics,
  startRunSpan,
  finishRunSpan,
  abortSpan,
  ConsoleReporter,
} from "./observability/index.js";
import type { PunchMetrics, ProgressReporter } from "./observability/index.js";

export interface PunchclockDeps {
  /** Portal or simulated action performer */
  executor: ActionExecutor;
  notifier?: Notifier;
  holidays?: HolidayCalendar;
  clock?: Clock;
  sleep?: Sleep;
  random?: RandomSource;
  logger?: pino.Logger;
  progress?: ProgressReporter;
  /** Overrides the Kafka producer built from `config.kafka` */
  events?: EventSink | null;
}

/**
 * Punchclock — the top-level facade.
 *
 * Usage:
 *   const clock = new Punchclock(loadConfig(), { executor });
 *   await clock.start();
 *   const report = await clock.run();
 *   await clock.shutdown();
 *
 * `run()` also works without `start()`; telemetry and the event stream
 * stay off in that case.
 */
export class Punchclock {
  private logger: pino.Logger;
  private readonly clock: Clock;
  private readonly progress: ProgressReporter;
  private readonly holidays: HolidayCalendar;
  private readonly notifications: PunchNotifications;
  private producer: EventProducer | null = null;
  private events: EventSink | null;
  private metrics: PunchMetrics | null = null;
  private started = false;

  constructor(
    private readonly config: PunchclockConfig,
    private readonly deps: PunchclockDeps,
  ) {
    this.logger = (deps.logger ?? pino({ level: config.logging.level })).child({
      component: "punchclock",
    });
    this.clock = deps.clock ?? systemClock;
    this.progress = deps.progress ?? new ConsoleReporter();
    this.events = deps.events ?? null;

    this.holidays =
      deps.holidays ??
      new HolidayService(
        {
          apiUrl: config.holidays.apiUrl,
          timeoutMs: config.holidays.timeoutMs,
          timeZone: config.timeZone,
          clock: this.clock,
        },
        deps.logger,
      );

    const notifier = deps.notifier ?? new EmailNotifier(config.notifications.smtp, deps.logger);
    const destinations = new DestinationResolver(config.notifications, config.simulate);
    this.notifications = new PunchNotifications(notifier, destinations, deps.logger);
  }

  /**
   * Init tracing/metrics and connect the event stream when configured.
   */
  async start(): Promise<void> {
    if (this.started) return;

    startTracing(this.config.observability);
    if (this.config.execution.metrics) {
      this.metrics = initMetrics(this.config.observability);
    }

    if (this.deps.events === undefined && this.config.kafka) {
      this.producer = new EventProducer(this.config.kafka, this.deps.logger, this.metrics);
      await this.producer.connect();
      this.events = this.producer;
    }

    this.started = true;
    this.logger.info({ events: this.events !== null, metrics: this.metrics !== null }, "Punchclock started");
  }

  async shutdown(): Promise<void> {
    if (!this.started) return;

    if (this.producer) {
      await this.producer.disconnect();
      this.producer = null;
      this.events = this.deps.events ?? null;
    }
    await stopTracing();
    await shutdownMetrics();
    this.metrics = null;

    this.started = false;
    this.logger.info("Punchclock shut down");
  }

  /**
   * One batch: activation gate, holiday gate, then every identifier.
   */
  async run(): Promise<RunReport> {
    const runId = nanoid(10);
    const log = this.logger.child({ runId });
    const masked = this.config.identifiers.map(maskIdentifier);

    if (!this.config.active) {
      log.info("Punchclock is not active, nothing to do");
      this.progress.notice("Punchclock is disabled (PUNCHCLOCK_ACTIVE is not true)");
      this.events?.emit(buildEvent("run.skipped", { runId }, { reason: "inactive" }));
      return { runId, status: "inactive", results: [] };
    }

    const holiday = await this.holidays.today();
    if (holiday) {
      log.info({ title: holiday.holiday.title, source: holiday.source }, "Holiday, no punches today");
      this.progress.notice(`Today is a holiday (${holiday.holiday.title}), ending run`);
      await this.notifications.holiday(holiday, masked);
      this.events?.emit(
        buildEvent("run.skipped", { runId }, { reason: "holiday", title: holiday.holiday.title }),
      );
      return { runId, status: "holiday", results: [], holiday };
    }

    const coordinator = new RunCoordinator(this.config, {
      executor: this.deps.executor,
      notifications: this.notifications,
      progress: this.progress,
      clock: this.clock,
      sleep: this.deps.sleep ?? sleep,
      random: this.deps.random,
      metrics: this.metrics,
      events: this.events,
      logger: this.deps.logger,
    });

    const now = this.clock.now();
    this.progress.runStarted({
      runId,
      identifiers: masked,
      primary: this.config.notifications.primary,
      ...(this.config.notifications.secondary
        ? { secondary: this.config.notifications.secondary.address }
        : {}),
      startedAt: `${formatDate(now, this.config.timeZone)} ${formatTime(now, this.config.timeZone)}`,
      mode: coordinator.concurrent ? "concurrent" : "sequential",
      maxWorkers: this.config.execution.maxWorkers,
      simulate: this.config.simulate,
    });

    const { span, ctx } = startRunSpan(runId, masked.length);
    this.events?.emit(
      buildEvent("run.started", { runId }, { identifiers: masked, simulate: this.config.simulate }, span),
    );

    try {
      const { results, statistics, summary } = await coordinator.coordinate(runId, ctx);

      this.progress.runFinished(statistics, this.config.execution.metrics ? summary : undefined);
      this.events?.emit(buildEvent("run.completed", { runId }, { ...statistics }, span));
      finishRunSpan(span, statistics);

      return { runId, status: "completed", results, statistics };
    } catch (err) {
      abortSpan(span, err);
      throw err;
    }
  }
}
