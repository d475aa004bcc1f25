// Per-identifier punch state machine:
//
//   [*] --> Start --> ExceptionCheck
//   ExceptionCheck --> Skip | CircuitGate
//   CircuitGate --> Rejected | DelayWait
//   DelayWait --> ActionTypeDetermine --> Attempt
//   Attempt --> Attempt (retry) | Success | FatalFailure
//   Skip | Rejected | Success | FatalFailure --> Notify
//   Notify --> End --> [*]

export type PunchState =
  | "Start"
  | "ExceptionCheck"
  | "Skip"
  | "CircuitGate"
  | "Rejected"
  | "DelayWait"
  | "ActionTypeDetermine"
  | "Attempt"
  | "Success"
  | "FatalFailure"
  | "Notify"
  | "End";

export const TRANSITIONS: Readonly<Record<PunchState, readonly PunchState[]>> = {
  Start: ["ExceptionCheck"],
  ExceptionCheck: ["Skip", "CircuitGate"],
  Skip: ["Notify"],
  CircuitGate: ["Rejected", "DelayWait"],
  Rejected: ["Notify"],
  DelayWait: ["ActionTypeDetermine"],
  ActionTypeDetermine: ["Attempt"],
  Attempt: ["Attempt", "Success", "FatalFailure"],
  Success: ["Notify"],
  FatalFailure: ["Notify"],
  Notify: ["End"],
  End: [],
};

export const TERMINAL_STATES: ReadonlySet<PunchState> = new Set(["End"]);

export interface LifecycleStatus {
  state: PunchState;
  attempts: number;
  lastError?: string;
  updatedAt: number;
}

export function initialStatus(): LifecycleStatus {
  return {
    state: "Start",
    attempts: 0,
    updatedAt: Date.now(),
  };
}
