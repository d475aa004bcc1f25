/**
 * Punch event topics.
 * All topics are prefixed with the configured topicPrefix.
 */

export const TOPICS = {
  /** Run lifecycle: started, completed, skipped (inactive/holiday) */
  RUNS: "runs",
  /** Per-identifier outcomes, keyed by correlation id */
  PUNCHES: "punches",
  /** Circuit breaker transitions */
  BREAKER: "breaker",
} as const;

export type TopicName = (typeof TOPICS)[keyof typeof TOPICS];

export function resolveTopicName(prefix: string, topic: TopicName): string {
  return `${prefix}.${topic}`;
}

/** Map event types to their target topics */
export function eventTypeToTopic(eventType: string): TopicName {
  if (eventType.startsWith("run.")) return TOPICS.RUNS;
  if (eventType.startsWith("breaker.")) return TOPICS.BREAKER;
  return TOPICS.PUNCHES;
}
