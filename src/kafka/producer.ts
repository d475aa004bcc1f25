import { Kafka, type Message, type Producer, type TopicMessages } from "kafkajs";
import pino from "pino";
import type { EventSink, KafkaConfig, PunchEvent } from "../types/index.js";
import type { PunchMetrics } from "../observability/metrics.js";
import { resolveTopicName, eventTypeToTopic } from "./topics.js";

/** How often queued events are shipped while connected. */
export const FLUSH_INTERVAL_MS = 1_000;

/**
 * Publishes punch events. A run emits a handful of events, so `emit` only
 * queues them; they go out on the flush timer, on `flush()` and on
 * `disconnect()`, one `sendBatch` per flush.
 */
export class EventProducer implements EventSink {
  private readonly producer: Producer;
  private logger: pino.Logger;
  private queue: PunchEvent[] = [];
  private timer: NodeJS.Timeout | null = null;
  private connected = false;

  constructor(
    private readonly config: KafkaConfig,
    logger?: pino.Logger,
    private readonly metrics: PunchMetrics | null = null,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({ component: "punchclock.events" });
    this.producer = new Kafka({ clientId: config.clientId, brokers: config.brokers }).producer({
      allowAutoTopicCreation: true,
    });
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    await this.producer.connect();
    this.connected = true;
    this.timer = setInterval(() => {
      this.flush().catch((err: unknown) => this.logger.error({ err }, "Scheduled event flush failed"));
    }, FLUSH_INTERVAL_MS);
    this.timer.unref();
    this.logger.info({ brokers: this.config.brokers }, "Event stream connected");
  }

  /** Ships whatever is still queued, then closes the connection. */
  async disconnect(): Promise<void> {
    if (!this.connected) return;
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    try {
      await this.flush();
    } finally {
      await this.producer.disconnect();
      this.connected = false;
      this.logger.info({ unsent: this.queue.length }, "Event stream disconnected");
    }
  }

  emit(event: PunchEvent): void {
    this.queue.push(event);
  }

  /** A failed send puts the events back at the head of the queue and rethrows. */
  async flush(): Promise<void> {
    if (!this.connected || this.queue.length === 0) return;

    const pending = this.queue;
    this.queue = [];
    const topicMessages = this.byTopic(pending);

    try {
      await this.producer.sendBatch({ topicMessages });
    } catch (err) {
      this.queue = [...pending, ...this.queue];
      this.logger.error({ err, events: pending.length }, "Could not publish events");
      throw err;
    }

    for (const { topic, messages } of topicMessages) {
      messages.forEach(() => this.metrics?.eventsEmitted({ topic }));
    }
    this.logger.debug({ events: pending.length }, "Events published");
  }

  get bufferedCount(): number {
    return this.queue.length;
  }

  private byTopic(events: readonly PunchEvent[]): TopicMessages[] {
    const topics = new Map<string, Message[]>();
    for (const event of events) {
      const topic = resolveTopicName(this.config.topicPrefix, eventTypeToTopic(event.type));
      const messages = topics.get(topic) ?? [];
      messages.push(toMessage(event));
      topics.set(topic, messages);
    }
    return [...topics].map(([topic, messages]) => ({ topic, messages }));
  }
}

/** Keyed by correlation id so one identifier's events stay ordered within a partition. */
function toMessage(event: PunchEvent): Message {
  return {
    key: event.correlationId,
    value: JSON.stringify(event),
    timestamp: String(event.timestamp),
    headers: {
      "event-type": event.type,
      "run-id": event.runId,
      ...(event.traceContext
        ? { "trace-id": event.traceContext.traceId, "span-id": event.traceContext.spanId }
        : {}),
    },
  };
}
