export { RunCoordinator } from "./coordinator.js";
export type { RunCoordinatorDeps, RunOutcome } from "./coordinator.js";
