import { systemClock, type Clock } from "./clock.js";
import {
  CancelledError,
  ConvergenceError,
  PublishError,
  ResolutionError,
  errorMessage,
  type Phase,
} from "./errors.js";
import type { PhaseStats } from "./journal.js";
import type { PollConfig } from "./poll-until.js";
import type { Reporter } from "./reporter.js";
import { nextState, type ConvergeState, type TerminalState } from "./state-machine.js";
import { runBuildStep } from "./steps/build.js";
import { runDeployStep } from "./steps/deploy.js";
import type { UnknownStatusPolicy } from "../types/config.js";
import type { RevisionSource, Publisher } from "../git/revision-source.js";
import type { BuildHandle, RemoteControlClient, Revision } from "../remote/client.js";

export type OrchestratorSettings = {
  build: PollConfig;
  deploy: PollConfig;
  buildsPageSize: number;
  unknownStatusPolicy: UnknownStatusPolicy;
};

export type OrchestratorDeps = {
  revisionSource: RevisionSource;
  publisher: Publisher;
  client: RemoteControlClient;
  reporter: Reporter;
  clock?: Clock;
};

/** What is known about the run at the moment of a transition. */
export type TransitionInfo = {
  revision: Revision | null;
  buildHandle: BuildHandle | null;
  phases: { build?: PhaseStats; deploy?: PhaseStats };
  error: ConvergenceError | null;
};

export type TransitionListener = (state: ConvergeState, info: TransitionInfo) => void;

export type OrchestratorResult = {
  success: boolean;
  finalState: TerminalState;
  revision: Revision | null;
  buildHandle: BuildHandle | null;
  transitions: ConvergeState[];
  elapsedMs: number;
  error?: ConvergenceError;
};

/**
 * Orchestrator — drives one invocation through the state machine:
 * resolve → publish → build → deploy → converged.
 *
 * Holds no state between invocations; every `run` starts from INIT.
 * Any failure ends the run in the matching terminal state and skips the remaining phases.
 */
export class Orchestrator {
  private readonly clock: Clock;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings,
  ) {
    this.clock = deps.clock ?? systemClock;
  }

  async run(opts: { signal?: AbortSignal; onTransition?: TransitionListener } = {}): Promise<OrchestratorResult> {
    const { signal, onTransition } = opts;
    const { client, reporter } = this.deps;
    const start = this.clock.now();

    let state: ConvergeState = "INIT";
    const transitions: ConvergeState[] = [state];
    const info: TransitionInfo = { revision: null, buildHandle: null, phases: {}, error: null };

    const advance = () => {
      state = nextState(state, { type: "advance" });
      transitions.push(state);
      onTransition?.(state, info);
    };

    const finish = (error?: ConvergenceError): OrchestratorResult => {
      if (error) {
        info.error = error;
        state = nextState(state, { type: "fail", to: error.state });
        transitions.push(state);
        onTransition?.(state, info);
        reporter.emit({ code: "FAILED", state, message: error.message });
      }
      return {
        success: state === "CONVERGED",
        finalState: this.terminal(state),
        revision: info.revision,
        buildHandle: info.buildHandle,
        transitions,
        elapsedMs: this.clock.now() - start,
        error,
      };
    };

    const aborted = (phase: Phase): CancelledError | null =>
      signal?.aborted ? new CancelledError(phase, this.clock.now() - start) : null;

    // INIT → RESOLVING
    advance();
    const cancelledResolve = aborted("resolve");
    if (cancelledResolve) return finish(cancelledResolve);
    let revision: Revision;
    try {
      revision = await this.deps.revisionSource.resolve();
    } catch (e) {
      return finish(e instanceof ResolutionError ? e : new ResolutionError(errorMessage(e), { cause: e }));
    }
    info.revision = revision;
    reporter.emit({ code: "REVISION_RESOLVED", revision });

    // RESOLVING → PUBLISHING
    advance();
    const cancelledPublish = aborted("publish");
    if (cancelledPublish) return finish(cancelledPublish);
    try {
      const published = await this.deps.publisher.publish(revision);
      reporter.emit({ code: "PUBLISHED", revision, skipped: !published });
    } catch (e) {
      return finish(e instanceof PublishError ? e : new PublishError(errorMessage(e), { cause: e }));
    }

    // PUBLISHING → BUILDING
    advance();
    const cancelledBuild = aborted("build");
    if (cancelledBuild) return finish(cancelledBuild);
    const build = await runBuildStep(revision, {
      client,
      clock: this.clock,
      reporter,
      poll: this.settings.build,
      pageSize: this.settings.buildsPageSize,
      unknownStatusPolicy: this.settings.unknownStatusPolicy,
      signal,
      onSubmitted: (handle) => {
        info.buildHandle = handle;
      },
    });
    if (!build.ok) return finish(build.error);
    info.phases.build = { elapsedMs: build.elapsedMs, attempts: build.attempts };

    // BUILDING → BUILD_OK → DEPLOYING
    advance();
    advance();
    const cancelledDeploy = aborted("deploy");
    if (cancelledDeploy) return finish(cancelledDeploy);
    const deploy = await runDeployStep(revision, {
      client,
      clock: this.clock,
      reporter,
      poll: this.settings.deploy,
      signal,
    });
    if (!deploy.ok) return finish(deploy.error);
    info.phases.deploy = { elapsedMs: deploy.elapsedMs, attempts: deploy.attempts };

    // DEPLOYING → CONVERGED
    advance();
    reporter.emit({ code: "CONVERGED", revision, elapsedMs: this.clock.now() - start });
    return finish();
  }

  private terminal(state: ConvergeState): TerminalState {
    switch (state) {
      case "INIT":
      case "RESOLVING":
      case "PUBLISHING":
      case "BUILDING":
      case "BUILD_OK":
      case "DEPLOYING":
        throw new Error(`run ended in non-terminal state ${state}`);
      default:
        return state;
    }
  }
}

/** Poll settings for both phases from seconds-based config values. */
export function pollConfigs(cfg: {
  poll_interval_sec: number;
  build_timeout_sec: number;
  deploy_timeout_sec: number;
}): { build: PollConfig; deploy: PollConfig } {
  const intervalMs = cfg.poll_interval_sec * 1000;
  return {
    build: { intervalMs, timeoutMs: cfg.build_timeout_sec * 1000 },
    deploy: { intervalMs, timeoutMs: cfg.deploy_timeout_sec * 1000 },
  };
}
