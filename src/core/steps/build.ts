import type { Clock } from "../clock.js";
import {
  BuildFailed,
  BuildTimeout,
  CancelledError,
  ClassifierContractError,
  SubmissionError,
  errorMessage,
} from "../errors.js";
import { pollUntil, type PollConfig, type TickResult } from "../poll-until.js";
import type { Reporter } from "../reporter.js";
import { OutcomeLatch, type Outcome } from "../status-classifier.js";
import type { UnknownStatusPolicy } from "../../types/config.js";
import type { BuildHandle, RemoteControlClient, Revision } from "../../remote/client.js";

export type BuildStepOpts = {
  client: RemoteControlClient;
  clock: Clock;
  reporter: Reporter;
  poll: PollConfig;
  pageSize: number;
  unknownStatusPolicy: UnknownStatusPolicy;
  signal?: AbortSignal;
  /** Called as soon as the control plane acknowledges the build. */
  onSubmitted?: (handle: BuildHandle) => void;
};

export type BuildStepResult =
  | { ok: true; handle: BuildHandle; elapsedMs: number; attempts: number }
  | { ok: false; error: SubmissionError | BuildFailed | BuildTimeout | CancelledError; attempts: number };

type BuildFailure = { status: string; cause?: ClassifierContractError };

async function submit(client: RemoteControlClient, revision: Revision): Promise<BuildHandle | SubmissionError> {
  try {
    const handle = await client.submitBuild(revision);
    if (handle.trim() === "") return new SubmissionError("build id missing from acknowledgement");
    return handle;
  } catch (e) {
    if (e instanceof SubmissionError) return e;
    return new SubmissionError(errorMessage(e), { cause: e });
  }
}

/**
 * Build step: submit a build for `revision` and poll the build listing until it settles.
 * `submitBuild` is called exactly once.
 */
export async function runBuildStep(revision: Revision, opts: BuildStepOpts): Promise<BuildStepResult> {
  const submitted = await submit(opts.client, revision);
  if (submitted instanceof SubmissionError) return { ok: false, error: submitted, attempts: 0 };

  const handle = submitted;
  opts.onSubmitted?.(handle);
  opts.reporter.emit({ code: "BUILD_SUBMITTED", revision, handle });

  // pollUntil stops at the first terminal tick, so within one step this latch never sees a second
  // terminal report; it guards callers that keep observing the same handle through it.
  const latch = new OutcomeLatch();

  const tick = async (): Promise<TickResult<null, BuildFailure>> => {
    const builds = await opts.client.listRecentBuilds(opts.pageSize);
    const record = builds.find((b) => b.handle === handle);
    const raw = record?.rawStatus;

    let outcome: Outcome;
    try {
      outcome = latch.observe(handle, raw);
    } catch (e) {
      if (e instanceof ClassifierContractError) return { kind: "failure", detail: { status: e.later, cause: e } };
      throw e;
    }

    switch (outcome) {
      case "SUCCEEDED":
        return { kind: "success", value: null };
      case "FAILED":
      case "CANCELLED":
        return { kind: "failure", detail: { status: raw ?? "" } };
      case "UNKNOWN":
        if (opts.unknownStatusPolicy === "fail") return { kind: "failure", detail: { status: raw ?? "" } };
        return { kind: "pending", observed: raw ?? "" };
      case "PENDING":
      case "RUNNING":
        return { kind: "pending", observed: raw ?? "" };
    }
  };

  const res = await pollUntil(tick, opts.poll, opts.clock, {
    signal: opts.signal,
    onTick: (t) =>
      opts.reporter.emit({ code: "BUILD_POLL", handle, status: t.observed, elapsedMs: t.elapsedMs, error: t.error }),
  });

  switch (res.kind) {
    case "success":
      opts.reporter.emit({ code: "BUILD_OK", handle, elapsedMs: res.elapsedMs });
      return { ok: true, handle, elapsedMs: res.elapsedMs, attempts: res.attempts };
    case "failure":
      return {
        ok: false,
        error: new BuildFailed(res.detail.status, handle, { cause: res.detail.cause }),
        attempts: res.attempts,
      };
    case "rejected":
      return {
        ok: false,
        error: new BuildFailed("REJECTED", handle, { cause: res.error, reason: res.error.message }),
        attempts: res.attempts,
      };
    case "timeout":
      return { ok: false, error: new BuildTimeout(res.elapsedMs, res.lastObserved || "PENDING"), attempts: res.attempts };
    case "cancelled":
      return { ok: false, error: new CancelledError("build", res.elapsedMs), attempts: res.attempts };
  }
}
