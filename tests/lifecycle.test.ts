import { describe, it, expect } from "vitest";
import { PunchLifecycle, type TransitionResult } from "../src/orchestrator/lifecycle.js";

describe("PunchLifecycle", () => {
  it("walks the happy path and counts attempts", () => {
    const seen: TransitionResult[] = [];
    const lifecycle = new PunchLifecycle("run-1", (t) => seen.push(t));

    for (const state of [
      "ExceptionCheck",
      "CircuitGate",
      "DelayWait",
      "ActionTypeDetermine",
      "Attempt",
      "Attempt",
      "Success",
      "Notify",
      "End",
    ] as const) {
      lifecycle.advance(state);
    }

    expect(lifecycle.state).toBe("End");
    expect(lifecycle.attempts).toBe(2);
    expect(lifecycle.isTerminal).toBe(true);
    expect(seen).toHaveLength(9);
    expect(seen[0]).toEqual({ correlationId: "run-1", previous: "Start", current: "ExceptionCheck" });
  });

  it("carries the error on a failing transition", () => {
    const lifecycle = new PunchLifecycle("run-2");
    lifecycle.advance("ExceptionCheck");
    lifecycle.advance("CircuitGate");

    const result = lifecycle.advance("Rejected", "circuit breaker open");

    expect(result).toEqual({
      correlationId: "run-2",
      previous: "CircuitGate",
      current: "Rejected",
      error: "circuit breaker open",
    });
    expect(lifecycle.attempts).toBe(0);
  });

  it("rejects transitions the machine does not allow", () => {
    const lifecycle = new PunchLifecycle("run-3");
    lifecycle.advance("ExceptionCheck");
    lifecycle.advance("Skip");

    expect(() => lifecycle.advance("Attempt")).toThrow(
      'Invalid transition for "run-3": "Skip" → "Attempt"',
    );
    expect(lifecycle.state).toBe("Skip");
    expect(lifecycle.isTerminal).toBe(false);
  });
});
