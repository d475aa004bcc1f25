import { describe, it, expect } from "vitest";
import { MetricsCollector } from "../src/observability/collector.js";
import { logFilePath } from "../src/observability/logger.js";
import { SimulatedExecutor } from "../browser/executor/simulated/simulated.js";
import { AFTERNOON, ManualClock, silentLogger } from "./helpers.js";

describe("MetricsCollector", () => {
  it("summarises the run", () => {
    let now = 1_000;
    const collector = new MetricsCollector(() => now);

    collector.recordStart();
    collector.recordDelay();
    collector.recordSuccess(2_000);
    collector.recordStart();
    collector.recordDelay();
    collector.recordSuccess(4_000);
    collector.recordStart();
    collector.recordError();
    now = 9_000;

    expect(collector.summary()).toEqual({
      processed: 3,
      successes: 2,
      errors: 1,
      successRate: 2 / 3,
      delaysApplied: 2,
      averageDurationMs: 3_000,
      totalExecutionMs: 8_000,
    });
  });

  it("reports zero rates for an empty run", () => {
    const summary = new MetricsCollector(() => 0).summary();

    expect(summary.successRate).toBe(0);
    expect(summary.averageDurationMs).toBe(0);
  });
});

describe("logFilePath", () => {
  it("names the file after the run number and local date", () => {
    const path = logFilePath(
      { level: "info", dir: "logs", runNumber: "42" },
      new Date("2025-03-15T02:00:00.000Z"),
      "America/Santiago",
    );

    expect(path).toBe("logs/punchclock-42-2025-03-14.log");
  });
});

describe("SimulatedExecutor", () => {
  it("succeeds without touching the portal", async () => {
    const executor = new SimulatedExecutor(new ManualClock(AFTERNOON), "America/Santiago", silentLogger);

    expect(await executor.perform("12345678k", "SALIDA", { correlationId: "abc-1" })).toEqual({
      ok: true,
      message: "🧪 Simulation: no SALIDA was made. Chile time 16:00:00 (CLT)",
    });
  });
});
