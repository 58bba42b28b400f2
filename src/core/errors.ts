import type { FailureState } from "./state-machine.js";

export type Phase = "resolve" | "publish" | "build" | "deploy";

/** Formats a millisecond duration the way operators read it in logs: "900s". */
export function formatSeconds(ms: number): string {
  return `${Math.round(ms / 1000)}s`;
}

/**
 * Base class for every fatal outcome of one invocation.
 * `state` is the terminal orchestrator state the error ends in.
 */
export abstract class ConvergenceError extends Error {
  abstract readonly code: string;
  abstract readonly state: FailureState;
  abstract readonly phase: Phase;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ResolutionError extends ConvergenceError {
  readonly code = "RESOLUTION_ERROR";
  readonly state = "RESOLUTION_FAILED";
  readonly phase = "resolve";

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`revision resolution failed: ${detail}`, options);
  }
}

export class PublishError extends ConvergenceError {
  readonly code = "PUBLISH_ERROR";
  readonly state = "PUBLISH_FAILED";
  readonly phase = "publish";

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`publish failed: ${detail}`, options);
  }
}

export class SubmissionError extends ConvergenceError {
  readonly code = "SUBMISSION_ERROR";
  readonly state = "SUBMIT_FAILED";
  readonly phase = "build";

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`build submission failed: ${detail}`, options);
  }
}

export class BuildFailed extends ConvergenceError {
  readonly code = "BUILD_FAILED";
  readonly state = "BUILD_FAILED";
  readonly phase = "build";

  constructor(
    readonly status: string,
    readonly handle: string,
    options?: { cause?: unknown; reason?: string },
  ) {
    super(`build failed: status=${status}${options?.reason ? `: ${options.reason}` : ""}`, options);
  }
}

export class BuildTimeout extends ConvergenceError {
  readonly code = "BUILD_TIMEOUT";
  readonly state = "BUILD_TIMEOUT";
  readonly phase = "build";

  constructor(readonly elapsedMs: number, readonly lastStatus: string) {
    super(`build timeout after ${formatSeconds(elapsedMs)}, last status=${lastStatus}`);
  }
}

export class DeploymentRequestError extends ConvergenceError {
  readonly code = "DEPLOYMENT_REQUEST_ERROR";
  readonly state = "DEPLOY_REQUEST_FAILED";
  readonly phase = "deploy";

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`deployment request failed: ${detail}`, options);
  }
}

export class DeployTimeout extends ConvergenceError {
  readonly code = "DEPLOY_TIMEOUT";
  readonly state = "DEPLOY_TIMEOUT";
  readonly phase = "deploy";

  constructor(readonly elapsedMs: number, readonly lastObserved: string, readonly expected: string) {
    super(
      `deploy timeout after ${formatSeconds(elapsedMs)}: deployed=${lastObserved || "(none)"} expected=${expected}`,
    );
  }
}

export class CancelledError extends ConvergenceError {
  readonly code = "CANCELLED";
  readonly state = "CANCELLED";

  constructor(readonly phase: Phase, readonly elapsedMs: number) {
    super(`${phase} cancelled after ${formatSeconds(elapsedMs)}`);
  }
}

/** The remote system reported a terminal status and later a different one for the same build. */
export class ClassifierContractError extends Error {
  constructor(
    readonly handle: string,
    readonly first: string,
    readonly later: string,
  ) {
    super(`build ${handle} reported terminal status ${first} and later ${later}`);
    this.name = "ClassifierContractError";
  }
}

export type RemoteErrorKind = "transport" | "rejected" | "protocol";

/**
 * Failure of a single remote control-plane call.
 * `rejected` means the control plane answered and refused; retrying the same call will not help.
 */
export class RemoteError extends Error {
  constructor(
    message: string,
    readonly kind: RemoteErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RemoteError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
