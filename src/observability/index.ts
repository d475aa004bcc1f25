export {
  startTracing,
  stopTracing,
  startRunSpan,
  finishRunSpan,
  startPunchSpan,
  finishPunchSpan,
  startAttemptSpan,
  finishAttemptSpan,
  abortSpan,
  traceContextOf,
} from "./tracer.js";
export type { Traced } from "./tracer.js";

export {
  initMetrics,
  shutdownMetrics,
} from "./metrics.js";

export type { PunchMetrics } from "./metrics.js";

export { MetricsCollector } from "./collector.js";
export type { MetricsSummary } from "./collector.js";

export { createLogger, logFilePath } from "./logger.js";

export { ConsoleReporter } from "./progress.js";
export type { ProgressReporter, PunchTarget, RunBanner } from "./progress.js";
