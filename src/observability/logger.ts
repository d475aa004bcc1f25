import { mkdirSync } from "node:fs";
import { join } from "node:path";
import pino from "pino";
import type { LoggingConfig } from "../types/index.js";
import { formatDate } from "../clock/clock.js";

/**
 * Path of the run-dated log file, e.g. `logs/punchclock-42-2025-03-14.log`.
 */
export function logFilePath(config: LoggingConfig, date: Date, timeZone?: string): string {
  return join(config.dir, `punchclock-${config.runNumber}-${formatDate(date, timeZone)}.log`);
}

/**
 * Root logger: JSON lines to stdout and appended to the run-dated file.
 */
export function createLogger(
  config: LoggingConfig,
  date: Date = new Date(),
  timeZone?: string,
): { logger: pino.Logger; file: string } {
  mkdirSync(config.dir, { recursive: true });
  const file = logFilePath(config, date, timeZone);

  const streams = pino.multistream([
    { level: config.level, stream: process.stdout },
    { level: config.level, stream: pino.destination({ dest: file, append: true, sync: true }) },
  ]);

  const logger = pino(
    {
      level: config.level,
      base: { service: "punchclock" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    streams,
  );

  return { logger, file };
}
