export { PunchOrchestrator } from "./orchestrator.js";
export type { OrchestratorDeps, OrchestratorOptions } from "./orchestrator.js";
export { PunchLifecycle } from "./lifecycle.js";
export type { TransitionResult, TransitionObserver } from "./lifecycle.js";
export { TRANSITIONS, TERMINAL_STATES } from "./states.js";
export type { PunchState, LifecycleStatus } from "./states.js";
