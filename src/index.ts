// Punchclock — scheduled clock-in/clock-out for a web time-tracking portal
// ========================================================================
//
// One run punches every configured identifier once: ENTRADA in the
// morning, SALIDA otherwise (Chile time). Each identifier waits a random
// delay, is attempted with retries behind a run-wide circuit breaker, and
// ends with exactly one email notice. Holidays end the run early.
//
// Architecture:
//
//   ┌──────────────────────────────────────────────────┐
//   │  Punchclock (facade)                             │
//   │    active? → holiday? → RunCoordinator           │
//   │  ┌────────────────────────────────────────────┐  │
//   │  │  worker pool (ExecutionPolicy)             │  │
//   │  │   └─ PunchOrchestrator per identifier      │  │
//   │  │       ├─ exception list                    │  │
//   │  │       ├─ CircuitBreaker gate               │  │
//   │  │       ├─ DelayCoordinator slot             │  │
//   │  │       ├─ RetrySupervisor → ActionExecutor  │  │
//   │  │       └─ PunchNotifications                │  │
//   │  └────────────────────────────────────────────┘  │
//   └──────────────────────┬───────────────────────────┘
//                          │
//         ┌────────────────┼────────────────┐
//         ↓                ↓                ↓
//   ┌──────────┐     ┌──────────┐     ┌──────────┐
//   │  Kafka   │     │  OTel    │     │  pino    │
//   │  events  │     │ traces + │     │  stdout  │
//   │          │     │ metrics  │     │  + file  │
//   └──────────┘     └──────────┘     └──────────┘
//
// The portal executor itself lives under browser/.

export { Punchclock } from "./punchclock.js";
export type { PunchclockDeps } from "./punchclock.js";

// Types
export type {
  ActionKind,
  ActionOutcome,
  ActionExecutor,
  PerformContext,
  FailureCategory,
  ExecutionAttempt,
  BreakerState,
  BreakerSnapshot,
  PunchResult,
  RunStatistics,
  RunReport,
  Holiday,
  HolidayMatch,
  PunchEvent,
  PunchEventType,
  EventSink,
  PunchclockConfig,
  KafkaConfig,
  ObservabilityConfig,
} from "./types/index.js";
export { UNKNOWN_ACTION_KIND } from "./types/index.js";

// Configuration
export { loadConfig, readSecret, ConfigError } from "./config/config.js";

// Building blocks
export {
  isValidIdentifier,
  maskIdentifier,
  isException,
  sameIdentifier,
} from "./identifier/identifier.js";
export { DelayCoordinator } from "./delay/coordinator.js";
export { CircuitBreaker } from "./resilience/circuit-breaker.js";
export { RetrySupervisor } from "./resilience/retry.js";
export { ExecutionPolicy } from "./policy/policy.js";
export { determineActionKind, CHILE_TIME_ZONE } from "./clock/clock.js";
export { PunchOrchestrator, PunchLifecycle } from "./orchestrator/index.js";
export { RunCoordinator } from "./run/index.js";
export { HolidayService } from "./holiday/holiday.js";
export type { HolidayCalendar } from "./holiday/holiday.js";

// Notifications
export {
  EmailNotifier,
  DestinationResolver,
  PunchNotifications,
} from "./notify/index.js";
export type { Notifier } from "./notify/index.js";

// Kafka
export { EventProducer } from "./kafka/producer.js";
export { TOPICS } from "./kafka/topics.js";

// Observability
export {
  startTracing,
  stopTracing,
  initMetrics,
  shutdownMetrics,
  createLogger,
  ConsoleReporter,
} from "./observability/index.js";
