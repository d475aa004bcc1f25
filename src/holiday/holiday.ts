import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { z } from "zod";
import type { Holiday, HolidayMatch } from "../types/index.js";
import { type Clock, systemClock, formatDate, CHILE_TIME_ZONE } from "../clock/clock.js";

/**
 * Answers whether today is excluded from punching.
 */
export interface HolidayCalendar {
  today(): Promise<HolidayMatch | null>;
}

const holidaySchema = z.object({
  date: z.string(),
  title: z.string(),
  type: z.string(),
});

const apiResponseSchema = z.object({
  status: z.string(),
  data: z.array(holidaySchema).optional(),
});

const localListSchema = z.array(holidaySchema);

export const BUNDLED_HOLIDAYS = fileURLToPath(
  new URL("../../data/holidays-cl.json", import.meta.url),
);

export interface HolidayServiceOptions {
  apiUrl: string;
  timeoutMs: number;
  localPath?: string;
  timeZone?: string;
  clock?: Clock;
  fetch?: typeof fetch;
}

/**
 * Looks today up in the online holiday API first and falls back to the
 * bundled list when the API is unreachable or does not list today.
 */
export class HolidayService implements HolidayCalendar {
  private logger: pino.Logger;
  private readonly fetchFn: typeof fetch;
  private readonly clock: Clock;

  constructor(
    private readonly options: HolidayServiceOptions,
    logger?: pino.Logger,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "punchclock.holidays",
    });
    this.fetchFn = options.fetch ?? fetch;
    this.clock = options.clock ?? systemClock;
  }

  async today(): Promise<HolidayMatch | null> {
    const date = formatDate(this.clock.now(), this.options.timeZone ?? CHILE_TIME_ZONE);

    try {
      const holiday = await this.checkOnline(date);
      if (holiday) {
        this.logger.info({ date, title: holiday.title }, "Holiday found via API");
        return { holiday, source: "api" };
      }
      this.logger.info({ date }, "API does not list today as a holiday");
    } catch (err) {
      this.logger.warn({ err, date }, "Holiday API unavailable, using bundled list");
    }

    try {
      const holiday = await this.checkLocal(date);
      if (holiday) {
        this.logger.info({ date, title: holiday.title }, "Holiday found in bundled list");
        return { holiday, source: "local" };
      }
    } catch (err) {
      this.logger.error({ err }, "Could not read bundled holiday list");
    }

    return null;
  }

  private async checkOnline(date: string): Promise<Holiday | null> {
    const response = await this.fetchFn(this.options.apiUrl, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Holiday API returned status ${response.status}`);
    }

    const body = apiResponseSchema.parse(await response.json());
    if (body.status !== "success") {
      throw new Error(`Holiday API returned status "${body.status}"`);
    }

    return (body.data ?? []).find((h) => h.date === date) ?? null;
  }

  private async checkLocal(date: string): Promise<Holiday | null> {
    const raw = await readFile(this.options.localPath ?? BUNDLED_HOLIDAYS, "utf-8");
    const holidays = localListSchema.parse(JSON.parse(raw));
    return holidays.find((h) => h.date === date) ?? null;
  }
}
