import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Span,
  type Context,
} from "@opentelemetry/api";
import { NodeTracerProvider, BatchSpanProcessor } from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type {
  ActionKind,
  ActionOutcome,
  ObservabilityConfig,
  PunchResult,
  RunStatistics,
} from "../types/index.js";

/**
 * Spans of one run:
 *
 *   run ─┬─ punch (per identifier) ─┬─ attempt.ENTRADA
 *        │                          └─ attempt.ENTRADA
 *        └─ punch ── attempt.SALIDA
 *
 * Without `startTracing` the global no-op tracer is used and every helper
 * still works.
 */
const tracer = () => trace.getTracer("punchclock");

let provider: NodeTracerProvider | null = null;

/** Registers the global provider; exports only when a trace endpoint is set. */
export function startTracing({ serviceName, traceEndpoint, resourceAttributes }: ObservabilityConfig): void {
  if (provider) return;
  provider = new NodeTracerProvider({
    resource: new Resource({ ...resourceAttributes, [ATTR_SERVICE_NAME]: serviceName }),
  });
  if (traceEndpoint) {
    provider.addSpanProcessor(new BatchSpanProcessor(new OTLPTraceExporter({ url: traceEndpoint })));
  }
  provider.register();
}

/** Flushes pending spans. */
export async function stopTracing(): Promise<void> {
  const current = provider;
  provider = null;
  await current?.shutdown();
}

export interface Traced {
  span: Span;
  ctx: Context;
}

function child(name: string, parent: Context, kind: SpanKind, attributes: Record<string, string | number>): Traced {
  const span = tracer().startSpan(name, { kind, attributes }, parent);
  return { span, ctx: trace.setSpan(parent, span) };
}

export function startRunSpan(runId: string, identifierCount: number): Traced {
  return child("run", context.active(), SpanKind.INTERNAL, {
    "punchclock.run.id": runId,
    "punchclock.run.identifiers": identifierCount,
  });
}

export function finishRunSpan(span: Span, statistics: RunStatistics): void {
  span.setAttributes({
    "punchclock.run.successes": statistics.successes,
    "punchclock.run.errors": statistics.errors,
    "punchclock.run.skipped": statistics.skipped,
  });
  span.setStatus({ code: SpanStatusCode.OK });
  span.end();
}

export function startPunchSpan(parent: Context, correlationId: string, maskedIdentifier: string): Traced {
  return child("punch", parent, SpanKind.INTERNAL, {
    "punchclock.correlation_id": correlationId,
    "punchclock.identifier": maskedIdentifier,
  });
}

/** Failed punches end in error, skips and successes in OK. */
export function finishPunchSpan(span: Span, result: PunchResult): void {
  span.setAttributes({
    "punchclock.punch.status": result.status,
    "punchclock.punch.attempts": result.attempts,
    ...(result.kind ? { "punchclock.action.kind": result.kind } : {}),
    ...(result.reason ? { "punchclock.punch.reason": result.reason } : {}),
  });
  span.setStatus(
    result.status === "failure"
      ? { code: SpanStatusCode.ERROR, message: result.error ?? result.reason ?? "punch failed" }
      : { code: SpanStatusCode.OK },
  );
  span.end();
}

export function startAttemptSpan(parent: Context, attempt: number, kind: ActionKind): Traced {
  return child(`attempt.${kind}`, parent, SpanKind.CLIENT, {
    "punchclock.attempt.index": attempt,
    "punchclock.action.kind": kind,
  });
}

export function finishAttemptSpan(span: Span, outcome: ActionOutcome): void {
  if (outcome.ok) {
    span.setStatus({ code: SpanStatusCode.OK });
  } else {
    span.setAttribute("punchclock.attempt.category", outcome.category);
    span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.error });
  }
  span.end();
}

/** Ends a span whose work threw instead of returning an outcome. */
export function abortSpan(span: Span, err: unknown): void {
  if (err instanceof Error) span.recordException(err);
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: err instanceof Error ? err.message : String(err),
  });
  span.end();
}

/** Trace and span ids stamped on emitted events. */
export function traceContextOf(span: Span): { traceId: string; spanId: string } {
  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}
