export { EventProducer } from "./producer.js";
export { buildEvent } from "./events.js";
export { TOPICS, resolveTopicName, eventTypeToTopic } from "./topics.js";
export type { TopicName } from "./topics.js";
