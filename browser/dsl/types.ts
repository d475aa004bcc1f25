// ============================================================================
// DSL Types — Declarative portal workflow definition
// ============================================================================

export interface PortalWorkflow {
  name: string;
  steps: Step[];
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export type StepType = "navigate" | "clickText" | "typeKeypad" | "pause";

export interface StepBase {
  type: StepType;
}

export interface NavigateStep extends StepBase {
  type: "navigate";
  url: string;
  /** Total tries before the navigation error is surfaced */
  retries: number;
  retryDelayMs: number;
}

/**
 * Click the first element matching `selector` whose trimmed, upper-cased
 * text equals `text`.
 */
export interface ClickTextStep extends StepBase {
  type: "clickText";
  selector: string;
  text: string;
  settleMs: number;
}

/**
 * Enter `value` one character at a time on an on-screen keypad whose keys
 * match `selector`.
 */
export interface TypeKeypadStep extends StepBase {
  type: "typeKeypad";
  selector: string;
  value: string;
  keyPauseMs: number;
  settleMs: number;
}

export interface PauseStep extends StepBase {
  type: "pause";
  ms: number;
}

export type Step = NavigateStep | ClickTextStep | TypeKeypadStep | PauseStep;
