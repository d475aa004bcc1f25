import {
  MeterProvider,
  PeriodicExportingMetricReader,
  type MetricReader,
} from "@opentelemetry/sdk-metrics";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig } from "../types/index.js";

let meterProvider: MeterProvider | null = null;

/**
 * Initialize the OpenTelemetry meter provider.
 */
export function initMetrics(config: ObservabilityConfig): PunchMetrics {
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...(config.resourceAttributes ?? {}),
  });

  const readers: MetricReader[] = [];

  if (config.metricsEndpoint) {
    const exporter = new OTLPMetricExporter({
      url: config.metricsEndpoint,
    });
    readers.push(
      new PeriodicExportingMetricReader({
        exporter,
        exportIntervalMillis: config.metricsInterval ?? 15000,
      }),
    );
  }

  const provider = new MeterProvider({ resource, readers });
  meterProvider = provider;

  return createMetrics(provider);
}

export async function shutdownMetrics(): Promise<void> {
  if (meterProvider) {
    await meterProvider.shutdown();
    meterProvider = null;
  }
}

/**
 * Punch metrics — counters and histograms.
 */
export interface PunchMetrics {
  /** Identifier outcomes */
  punchCount: (attrs: { status: string; kind: string }) => void;
  /** Duration of a single portal attempt */
  attemptDuration: (ms: number, attrs: { outcome: string; kind: string }) => void;
  /** Random delay assigned before acting */
  delayMinutes: (minutes: number) => void;
  /** Delay draws that could not avoid a collision */
  delayCollisions: () => void;
  /** Circuit breaker state changes */
  breakerTransitions: (attrs: { from: string; to: string }) => void;
  /** Kafka events emitted */
  eventsEmitted: (attrs: { topic: string }) => void;
}

function createMetrics(provider: MeterProvider): PunchMetrics {
  const meter = provider.getMeter("punchclock");

  const punchCounter = meter.createCounter("punchclock.punches.total", {
    description: "Identifiers processed, by outcome",
  });

  const attemptHist = meter.createHistogram("punchclock.attempts.duration_ms", {
    description: "Portal attempt duration in milliseconds",
    unit: "ms",
  });

  const delayHist = meter.createHistogram("punchclock.delay.minutes", {
    description: "Random delay applied before a punch",
    unit: "min",
  });

  const collisionCounter = meter.createCounter("punchclock.delay.collisions_total", {
    description: "Delay assignments that collided after every redraw",
  });

  const breakerCounter = meter.createCounter("punchclock.breaker.transitions_total", {
    description: "Circuit breaker state transitions",
  });

  const eventCounter = meter.createCounter("punchclock.kafka.events_total", {
    description: "Total events emitted to Kafka",
  });

  return {
    punchCount: (attrs) => punchCounter.add(1, attrs),
    attemptDuration: (ms, attrs) => attemptHist.record(ms, attrs),
    delayMinutes: (minutes) => delayHist.record(minutes),
    delayCollisions: () => collisionCounter.add(1),
    breakerTransitions: (attrs) => breakerCounter.add(1, attrs),
    eventsEmitted: (attrs) => eventCounter.add(1, attrs),
  };
}
