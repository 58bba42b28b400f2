import type { Clock } from "../clock.js";
import { CancelledError, DeployTimeout, DeploymentRequestError, errorMessage } from "../errors.js";
import { pollUntil, type PollConfig, type TickResult } from "../poll-until.js";
import type { Reporter } from "../reporter.js";
import type { RemoteControlClient, Revision } from "../../remote/client.js";

export type DeployStepOpts = {
  client: RemoteControlClient;
  clock: Clock;
  reporter: Reporter;
  poll: PollConfig;
  signal?: AbortSignal;
};

export type DeployStepResult =
  | { ok: true; elapsedMs: number; attempts: number }
  | { ok: false; error: DeploymentRequestError | DeployTimeout | CancelledError; attempts: number };

/**
 * Deploy step: ask for `revision` to go live, then poll the live revision until it matches.
 * There is no failure status here; a deploy that never converges ends in a timeout, and a
 * control plane that refuses the status read ends it as a failed deployment request.
 */
export async function runDeployStep(revision: Revision, opts: DeployStepOpts): Promise<DeployStepResult> {
  try {
    await opts.client.requestDeployment(revision);
  } catch (e) {
    return { ok: false, error: new DeploymentRequestError(errorMessage(e), { cause: e }), attempts: 0 };
  }
  opts.reporter.emit({ code: "DEPLOY_REQUESTED", revision });

  const tick = async (): Promise<TickResult<null, never>> => {
    const deployed = await opts.client.getDeployedRevision();
    if (deployed === revision) return { kind: "success", value: null };
    return { kind: "pending", observed: deployed };
  };

  // First read is one interval after the request.
  const res = await pollUntil(tick, { ...opts.poll, delayFirstPoll: true }, opts.clock, {
    signal: opts.signal,
    onTick: (t) =>
      opts.reporter.emit({
        code: "DEPLOY_POLL",
        deployed: t.observed,
        expected: revision,
        elapsedMs: t.elapsedMs,
        error: t.error,
      }),
  });

  switch (res.kind) {
    case "success":
      return { ok: true, elapsedMs: res.elapsedMs, attempts: res.attempts };
    case "failure":
      return res.detail;
    case "rejected":
      return {
        ok: false,
        error: new DeploymentRequestError(res.error.message, { cause: res.error }),
        attempts: res.attempts,
      };
    case "timeout":
      return { ok: false, error: new DeployTimeout(res.elapsedMs, res.lastObserved, revision), attempts: res.attempts };
    case "cancelled":
      return { ok: false, error: new CancelledError("deploy", res.elapsedMs), attempts: res.attempts };
  }
}
