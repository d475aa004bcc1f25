import { setTimeout as delay } from "node:timers/promises";
import type { ActionKind } from "../types/index.js";

export const CHILE_TIME_ZONE = "America/Santiago";

/** Clock-in window, local hours [start, end). */
export const ENTRADA_HOURS = { start: 5, end: 12 } as const;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: number;
  minute: string;
  second: string;
}

/**
 * Wall-clock fields of `date` as seen in `timeZone`.
 */
export function zonedParts(date: Date, timeZone: string = CHILE_TIME_ZONE): ZonedParts {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const field = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return {
    year: field("year"),
    month: field("month"),
    day: field("day"),
    hour: parseInt(field("hour"), 10),
    minute: field("minute"),
    second: field("second"),
  };
}

/** `YYYY-MM-DD` in the given zone. */
export function formatDate(date: Date, timeZone: string = CHILE_TIME_ZONE): string {
  const p = zonedParts(date, timeZone);
  return `${p.year}-${p.month}-${p.day}`;
}

/** `HH:MM:SS` in the given zone. */
export function formatTime(date: Date, timeZone: string = CHILE_TIME_ZONE): string {
  const p = zonedParts(date, timeZone);
  return `${String(p.hour).padStart(2, "0")}:${p.minute}:${p.second}`;
}

/**
 * ENTRADA when the local hour falls in [5, 12), SALIDA otherwise.
 */
export function determineActionKind(
  date: Date,
  timeZone: string = CHILE_TIME_ZONE,
): ActionKind {
  const { hour } = zonedParts(date, timeZone);
  return hour >= ENTRADA_HOURS.start && hour < ENTRADA_HOURS.end ? "ENTRADA" : "SALIDA";
}
