import pino from "pino";
import type {
  ActionExecutor,
  ActionKind,
  ActionOutcome,
  ExecutionAttempt,
  PunchclockConfig,
  PunchEvent,
  PunchResult,
  RunStatistics,
  EventSink,
} from "../src/types/index.js";
import type { Clock } from "../src/clock/clock.js";
import type { Notifier } from "../src/notify/notifier.js";
import type { ProgressReporter, PunchTarget, RunBanner } from "../src/observability/progress.js";
import type { TransitionResult } from "../src/orchestrator/lifecycle.js";

export const silentLogger = pino({ level: "silent" });

/** 08:00 in Santiago (UTC-4 in June) */
export const MORNING = "2025-06-10T12:00:00.000Z";
/** 16:00 in Santiago */
export const AFTERNOON = "2025-06-10T20:00:00.000Z";

export class ManualClock implements Clock {
  private current: number;

  constructor(iso: string = MORNING) {
    this.current = Date.parse(iso);
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface SentMail {
  subject: string;
  body: string;
  destinations: string[];
}

export class RecordingNotifier implements Notifier {
  sent: SentMail[] = [];
  deliver = true;

  async notify(subject: string, body: string, destinations: readonly string[]): Promise<boolean> {
    this.sent.push({ subject, body, destinations: [...destinations] });
    return this.deliver;
  }
}

/** Replays `outcomes` in order, repeating the last one. */
export class ScriptedExecutor implements ActionExecutor {
  calls: { identifier: string; kind: ActionKind; correlationId: string }[] = [];

  constructor(private readonly outcomes: ActionOutcome[] = [{ ok: true, message: "done" }]) {}

  async perform(
    identifier: string,
    kind: ActionKind,
    context: { correlationId: string },
  ): Promise<ActionOutcome> {
    this.calls.push({ identifier, kind, correlationId: context.correlationId });
    const index = Math.min(this.calls.length, this.outcomes.length) - 1;
    return this.outcomes[index] ?? { ok: true, message: "done" };
  }
}

export class RecordingReporter implements ProgressReporter {
  finished: PunchResult[] = [];
  notices: string[] = [];
  statistics: RunStatistics | null = null;

  runStarted(_banner: RunBanner): void {}
  stateChanged(_result: TransitionResult): void {}
  delayApplied(_target: PunchTarget, _minutes: number): void {}
  actionDetermined(_target: PunchTarget, _kind: ActionKind): void {}
  attemptFinished(_target: PunchTarget, _attempt: ExecutionAttempt): void {}

  punchFinished(result: PunchResult): void {
    this.finished.push(result);
  }

  runFinished(stats: RunStatistics): void {
    this.statistics = stats;
  }

  notice(message: string): void {
    this.notices.push(message);
  }
}

export class RecordingSink implements EventSink {
  events: PunchEvent[] = [];

  emit(event: PunchEvent): void {
    this.events.push(event);
  }
}

export function testConfig(overrides: Partial<PunchclockConfig> = {}): PunchclockConfig {
  return {
    active: true,
    simulate: true,
    identifiers: ["11111111k", "222222222"],
    exceptions: [],
    notifications: {
      primary: "primary@example.com",
      smtp: {
        host: "smtp.example.com",
        port: 587,
        user: "primary@example.com",
        password: "test-secret",
      },
    },
    execution: {
      mode: "sequential",
      maxWorkers: 2,
      retryAttempts: 2,
      retryDelaySeconds: 5,
      breakerThreshold: 3,
      breakerResetSeconds: 60,
      metrics: true,
    },
    portal: { timeoutMs: 30_000 },
    holidays: {
      apiUrl: "https://holidays.example.test/holidays.json",
      timeoutMs: 5_000,
    },
    logging: { level: "info", dir: "./logs", runNumber: "test" },
    artifactDir: "./artifacts",
    observability: { serviceName: "punchclock-test" },
    timeZone: "America/Santiago",
    ...overrides,
  };
}
