/**
 * Orchestrator states, in order of a successful run.
 */
export const PROGRESS_STATES = ["INIT", "RESOLVING", "PUBLISHING", "BUILDING", "BUILD_OK", "DEPLOYING"] as const;

export type ProgressState = (typeof PROGRESS_STATES)[number];

export const FAILURE_STATES = [
  "RESOLUTION_FAILED",
  "PUBLISH_FAILED",
  "SUBMIT_FAILED",
  "BUILD_FAILED",
  "BUILD_TIMEOUT",
  "DEPLOY_REQUEST_FAILED",
  "DEPLOY_TIMEOUT",
  "CANCELLED",
] as const;

export type FailureState = (typeof FAILURE_STATES)[number];

export type ConvergeState = ProgressState | FailureState | "CONVERGED";

export type TerminalState = FailureState | "CONVERGED";

/**
 * Events that drive state transitions. Failure events carry the state they end in.
 */
export type TransitionEvent = { type: "advance" } | { type: "fail"; to: FailureState };

/** Successor of each in-progress state on `advance`. */
const ADVANCE: Record<ProgressState, ProgressState | "CONVERGED"> = {
  INIT: "RESOLVING",
  RESOLVING: "PUBLISHING",
  PUBLISHING: "BUILDING",
  BUILDING: "BUILD_OK",
  BUILD_OK: "DEPLOYING",
  DEPLOYING: "CONVERGED",
};

/** Failure states reachable from each in-progress state. CANCELLED is reachable from all of them. */
const FAILURES: Record<ProgressState, readonly FailureState[]> = {
  INIT: [],
  RESOLVING: ["RESOLUTION_FAILED"],
  PUBLISHING: ["PUBLISH_FAILED"],
  BUILDING: ["SUBMIT_FAILED", "BUILD_FAILED", "BUILD_TIMEOUT"],
  BUILD_OK: [],
  DEPLOYING: ["DEPLOY_REQUEST_FAILED", "DEPLOY_TIMEOUT"],
};

export function isTerminal(state: ConvergeState): state is TerminalState {
  return state === "CONVERGED" || FAILURE_STATES.some((s) => s === state);
}

export class InvalidTransitionError extends Error {
  constructor(readonly from: ConvergeState, readonly event: TransitionEvent) {
    super(`invalid transition from ${from} on ${event.type === "fail" ? `fail→${event.to}` : "advance"}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Pure function: given current state + event, return next state.
 * Terminal states never transition onward.
 */
export function nextState(current: ConvergeState, event: TransitionEvent): ConvergeState {
  if (isTerminal(current)) throw new InvalidTransitionError(current, event);

  if (event.type === "advance") return ADVANCE[current];

  if (event.to === "CANCELLED" && current !== "INIT") return "CANCELLED";
  if (FAILURES[current].includes(event.to)) return event.to;
  throw new InvalidTransitionError(current, event);
}
