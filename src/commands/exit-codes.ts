import type { TerminalState } from "../core/state-machine.js";

/**
 * CLI exit codes. Every terminal failure state has its own code; 0 means CONVERGED.
 */
export const EXIT = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  INVALID_ARGS: 3,
  CONCURRENT_RUN: 4,
  RESOLUTION_FAILED: 10,
  PUBLISH_FAILED: 11,
  SUBMIT_FAILED: 12,
  BUILD_FAILED: 13,
  BUILD_TIMEOUT: 14,
  DEPLOY_REQUEST_FAILED: 15,
  DEPLOY_TIMEOUT: 16,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(state: TerminalState): ExitCode {
  return state === "CONVERGED" ? EXIT.SUCCESS : EXIT[state];
}
