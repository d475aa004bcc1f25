import { nanoid } from "nanoid";
import type { Span } from "@opentelemetry/api";
import type { PunchEvent, PunchEventType } from "../types/index.js";
import { traceContextOf } from "../observability/tracer.js";

export function buildEvent(
  type: PunchEventType,
  ids: { runId: string; correlationId?: string },
  payload: Record<string, unknown>,
  span?: Span,
): PunchEvent {
  return {
    id: nanoid(),
    type,
    source: "punchclock",
    runId: ids.runId,
    correlationId: ids.correlationId ?? ids.runId,
    timestamp: Date.now(),
    payload,
    ...(span ? { traceContext: traceContextOf(span) } : {}),
  };
}
