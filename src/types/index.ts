// ============================================================================
// Punch Types — one clock action for one identifier
// ============================================================================

/** Clock-in (ENTRADA) or clock-out (SALIDA), as labelled on the portal keypad. */
export type ActionKind = "ENTRADA" | "SALIDA";

/** Reported in failure notices when the action kind was never determined. */
export const UNKNOWN_ACTION_KIND = "MARCAJE";

export type ReportedActionKind = ActionKind | typeof UNKNOWN_ACTION_KIND;

/** Why a single punch attempt failed. */
export type FailureCategory =
  /** Page load or selector wait exceeded its timeout */
  | "timeout"
  /** Browser could not be launched or the protocol connection broke */
  | "driver-error"
  /** A button, keypad key or submit control was missing from the page */
  | "element-not-found"
  /** Anything else */
  | "unexpected";

/**
 * What an executor returns for one attempt. Expected failures are values,
 * never exceptions.
 */
export type ActionOutcome =
  | { ok: true; message: string }
  | { ok: false; category: FailureCategory; error: string };

export interface PerformContext {
  correlationId: string;
}

/**
 * Performs the clock action on the external portal.
 */
export interface ActionExecutor {
  perform(
    identifier: string,
    kind: ActionKind,
    context: PerformContext,
  ): Promise<ActionOutcome>;
}

export type AttemptOutcome = "success" | "retryable-failure" | "fatal-failure";

/** One try of the action; logged and then discarded. */
export interface ExecutionAttempt {
  index: number;
  maxAttempts: number;
  startedAt: number;
  outcome: AttemptOutcome;
  durationMs: number;
  category?: FailureCategory;
  error?: string;
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export type BreakerState = "Closed" | "Open" | "HalfOpen";

export interface BreakerSnapshot {
  state: BreakerState;
  failureCount: number;
  threshold: number;
  resetTimeoutMs: number;
  /** ISO timestamp of the last recorded failure */
  lastFailureTime: string | null;
}

export interface BreakerTransition {
  from: BreakerState;
  to: BreakerState;
  failureCount: number;
}

// ============================================================================
// Results & Statistics
// ============================================================================

export type PunchStatus = "success" | "failure" | "skipped";

export type PunchFailureReason =
  | FailureCategory
  | "circuit-open"
  | "crashed";

export interface PunchResult {
  /** Masked identifier; the raw token never leaves the orchestrator */
  identifier: string;
  correlationId: string;
  status: PunchStatus;
  kind?: ActionKind;
  attempts: number;
  durationMs: number;
  delayMinutes?: number;
  reason?: PunchFailureReason;
  error?: string;
  notified: boolean;
}

export interface RunStatistics {
  total: number;
  successes: number;
  errors: number;
  skipped: number;
  successRate: number;
  collisions: number;
  delaysApplied: number;
  averageDurationMs: number;
  totalDurationMs: number;
  /** Correlation id → processing duration */
  durations: Record<string, number>;
  breaker: BreakerSnapshot;
}

export type RunStatus = "completed" | "inactive" | "holiday";

export interface RunReport {
  runId: string;
  status: RunStatus;
  results: PunchResult[];
  statistics?: RunStatistics;
  holiday?: HolidayMatch;
}

// ============================================================================
// Holidays
// ============================================================================

export interface Holiday {
  date: string;
  title: string;
  type: string;
}

export interface HolidayMatch {
  holiday: Holiday;
  source: "api" | "local";
}

// ============================================================================
// Event Stream
// ============================================================================

export interface PunchEvent {
  id: string;
  type: PunchEventType;
  source: string;
  runId: string;
  /** Per-identifier correlation id; equals runId for run-level events */
  correlationId: string;
  timestamp: number;
  payload: Record<string, unknown>;
  traceContext?: {
    traceId: string;
    spanId: string;
  };
}

export type PunchEventType =
  | "run.started"
  | "run.completed"
  | "run.skipped"
  | "punch.skipped"
  | "punch.succeeded"
  | "punch.failed"
  | "breaker.transition";

/** Write-only observer for punch events. */
export interface EventSink {
  emit(event: PunchEvent): void;
}

// ============================================================================
// Configuration
// ============================================================================

export type ExecutionMode = "sequential" | "concurrent";

export interface ExecutionConfig {
  mode: ExecutionMode;
  /** Worker pool size, 1–10 */
  maxWorkers: number;
  /** Extra attempts after the first one */
  retryAttempts: number;
  retryDelaySeconds: number;
  breakerThreshold: number;
  breakerResetSeconds: number;
  /** Whether OpenTelemetry metrics and the extended summary are enabled */
  metrics: boolean;
}

export interface NotificationConfig {
  primary: string;
  /** Optional second address that only hears about its own identifier */
  secondary?: {
    address: string;
    identifier: string;
  };
  smtp: {
    host: string;
    port: number;
    user: string;
    password: string;
  };
}

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
  /** Topic prefix for all punch topics */
  topicPrefix: string;
}

export interface ObservabilityConfig {
  /** Service name for traces/metrics */
  serviceName: string;
  traceEndpoint?: string;
  metricsEndpoint?: string;
  /** Metrics export interval (ms) */
  metricsInterval?: number;
  resourceAttributes?: Record<string, string>;
}

export interface LoggingConfig {
  level: "debug" | "info" | "warn" | "error";
  dir: string;
  runNumber: string;
}

export interface PortalSettings {
  url?: string;
  executablePath?: string;
  timeoutMs: number;
}

export interface PunchclockConfig {
  active: boolean;
  /** Simulation mode: no delay, no portal, primary address only */
  simulate: boolean;
  identifiers: string[];
  exceptions: string[];
  notifications: NotificationConfig;
  execution: ExecutionConfig;
  portal: PortalSettings;
  holidays: {
    apiUrl: string;
    timeoutMs: number;
  };
  logging: LoggingConfig;
  artifactDir: string;
  kafka?: KafkaConfig;
  observability: ObservabilityConfig;
  timeZone: string;
}
