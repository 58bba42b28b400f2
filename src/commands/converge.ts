import path from "node:path";
import { loadConfig, type RawConfig } from "../config/loader.js";
import { validateConfig, type Diagnostic } from "../config/validator.js";
import { systemClock, type Clock } from "../core/clock.js";
import { errorMessage } from "../core/errors.js";
import { makeRunId, RunJournal } from "../core/journal.js";
import { Orchestrator, pollConfigs, type OrchestratorResult } from "../core/orchestrator.js";
import { StreamReporter, type OutputFormat, type ReporterSinks } from "../core/reporter.js";
import { GitOperations } from "../git/operations.js";
import { GitPushPublisher, GitRevisionSource, type Publisher, type RevisionSource } from "../git/revision-source.js";
import type { RemoteControlClient } from "../remote/client.js";
import { NorthflankCliClient } from "../remote/northflank-cli.js";
import type { TerminalState } from "../core/state-machine.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type ConvergeOpts = {
  configDir?: string;
  envName?: string;
  revision?: string;
  /** `false` skips `git push`; overrides the `push` config key. */
  push?: boolean;
  force?: boolean;
  format?: OutputFormat;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

/** Collaborators a caller may substitute; anything omitted is built from config. */
export type ConvergeDeps = {
  client?: RemoteControlClient;
  revisionSource?: RevisionSource;
  publisher?: Publisher;
  clock?: Clock;
  sinks?: ReporterSinks;
};

export type ConvergeResult =
  | { ok: true; exitCode: ExitCode; runId: string; statePath: string; revision: string; finalState: TerminalState }
  | {
      ok: false;
      exitCode: ExitCode;
      error: string;
      diagnostics?: Diagnostic[];
      runId?: string;
      statePath?: string;
      finalState?: TerminalState;
    };

/**
 * Resolve config, guard against a concurrent run for the same service, then drive the orchestrator
 * and journal every transition.
 */
export async function converge(opts: ConvergeOpts = {}, deps: ConvergeDeps = {}): Promise<ConvergeResult> {
  const cwd = opts.cwd ?? process.cwd();

  const overrides: RawConfig = {};
  if (opts.push === false) overrides.push = false;

  let raw: RawConfig;
  try {
    raw = loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env, overrides });
  } catch (e) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: errorMessage(e) };
  }

  const loaded = validateConfig(raw);
  if (!loaded.valid) {
    return {
      ok: false,
      exitCode: EXIT.INVALID_ARGS,
      error: loaded.diagnostics.map((d) => d.message).join("; "),
      diagnostics: loaded.diagnostics,
    };
  }
  const config = loaded.config;

  const journal = new RunJournal(path.resolve(cwd, config.runs_dir));
  const active = journal.findActive(config.project_id, config.service_id);
  if (active && !opts.force) {
    return {
      ok: false,
      exitCode: EXIT.CONCURRENT_RUN,
      error: `Active run already in progress: ${active.runId} (state: ${active.state}, pid: ${active.pid})`,
    };
  }

  const repoDir = path.resolve(cwd, config.repo_dir);
  let git: GitOperations | null = null;
  const gitOps = () => (git ??= new GitOperations(repoDir));

  const revisionSource = deps.revisionSource ?? new GitRevisionSource(gitOps(), opts.revision);
  const publisher =
    deps.publisher ?? new GitPushPublisher(gitOps(), config.git_remote, config.git_branch, config.push);
  const client =
    deps.client ??
    new NorthflankCliClient({
      projectId: config.project_id,
      serviceId: config.service_id,
      branch: config.git_branch,
      bin: config.cli_bin,
      commandTimeoutMs: config.command_timeout_sec * 1000,
    });

  const orchestrator = new Orchestrator(
    {
      revisionSource,
      publisher,
      client,
      reporter: new StreamReporter(opts.format ?? "human", deps.sinks),
      clock: deps.clock ?? systemClock,
    },
    {
      ...pollConfigs(config),
      buildsPageSize: config.builds_page_size,
      unknownStatusPolicy: config.unknown_status_policy,
    },
  );

  const runId = makeRunId();
  const statePath = journal.statePath(runId);
  let record = journal.create({ runId, projectId: config.project_id, serviceId: config.service_id });

  let result: OrchestratorResult;
  try {
    result = await orchestrator.run({
      signal: opts.signal,
      onTransition: (state, info) => {
        record = journal.update(record, {
          state,
          revision: info.revision,
          buildHandle: info.buildHandle,
          phases: { ...info.phases },
          error: info.error ? { code: info.error.code, message: info.error.message } : null,
        });
      },
    });
  } catch (e) {
    journal.abandon(record, errorMessage(e));
    throw e;
  }

  const exitCode = exitCodeFor(result.finalState);
  if (result.success && result.revision !== null) {
    return { ok: true, exitCode, runId, statePath, revision: result.revision, finalState: result.finalState };
  }
  return {
    ok: false,
    exitCode,
    error: result.error?.message ?? `run ended in ${result.finalState}`,
    runId,
    statePath,
    finalState: result.finalState,
  };
}
