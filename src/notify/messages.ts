import pino from "pino";
import type {
  ActionKind,
  HolidayMatch,
  ReportedActionKind,
} from "../types/index.js";
import type { Notifier } from "./notifier.js";
import type { DestinationResolver } from "./destinations.js";

export type NotificationCategory = "success" | "failure" | "skip" | "holiday";

export interface SentNotice {
  category: NotificationCategory;
  subject: string;
  body: string;
  destinations: string[];
}

/**
 * Composes and sends the four kinds of notice. Transport failures are
 * logged and reported as `false`; they never throw.
 */
export class PunchNotifications {
  private logger: pino.Logger;

  constructor(
    private readonly notifier: Notifier,
    private readonly destinations: DestinationResolver,
    logger?: pino.Logger,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "punchclock.notifications",
    });
  }

  async succeeded(
    identifier: string,
    masked: string,
    kind: ActionKind,
    message: string,
    durationMs: number,
  ): Promise<boolean> {
    return this.send({
      category: "success",
      subject: `✅ Punch confirmed (${kind}) - ${masked}`,
      body: `${message}\n\nProcessed in ${(durationMs / 1000).toFixed(1)}s.`,
      destinations: this.destinations.forIdentifier(identifier),
    });
  }

  async failed(
    identifier: string,
    masked: string,
    kind: ReportedActionKind,
    error: string,
    attemptLog: readonly string[],
  ): Promise<boolean> {
    const lines = [
      `❌ ${kind} failed for ${masked}:`,
      error,
    ];
    if (attemptLog.length > 0) {
      lines.push("", "Attempts:", ...attemptLog);
    }
    return this.send({
      category: "failure",
      subject: `⚠️ Punch problem - ${masked}`,
      body: lines.join("\n"),
      destinations: this.destinations.forIdentifier(identifier),
    });
  }

  async skipped(identifier: string, masked: string, at: string): Promise<boolean> {
    return this.send({
      category: "skip",
      subject: `🚫 Skipped - ${masked}`,
      body: [
        `${masked} is on the exception list and was not punched.`,
        "",
        `Date: ${at}`,
        "",
        "Remove it from PUNCHCLOCK_EXCEPTIONS to punch it again.",
      ].join("\n"),
      destinations: this.destinations.forIdentifier(identifier),
    });
  }

  async holiday(match: HolidayMatch, maskedIdentifiers: readonly string[]): Promise<boolean> {
    const { holiday, source } = match;
    return this.send({
      category: "holiday",
      subject: `📅 Holiday notice: ${holiday.title}`,
      body: [
        `Today is a holiday (${holiday.title}); no punch will be made.`,
        `Type: ${holiday.type}`,
        `Source: ${source === "api" ? "online API" : "bundled list"}`,
        `Configured identifiers: ${maskedIdentifiers.length} - ${maskedIdentifiers.join(", ")}`,
      ].join("\n"),
      destinations: this.destinations.forBroadcast(),
    });
  }

  private async send(notice: SentNotice): Promise<boolean> {
    try {
      const delivered = await this.notifier.notify(notice.subject, notice.body, notice.destinations);
      if (!delivered) {
        this.logger.error(
          { category: notice.category, destinations: notice.destinations.length },
          "Notification was not delivered",
        );
      }
      return delivered;
    } catch (err) {
      this.logger.error({ err, category: notice.category }, "Notification transport failed");
      return false;
    }
  }
}
