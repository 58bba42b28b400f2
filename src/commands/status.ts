import { loadConfig } from "../config/loader.js";
import { RunJournal, type RunRecord, type RunSummary } from "../core/journal.js";
import { DEFAULT_CONFIG } from "../types/config.js";

export type StatusResult =
  | { ok: true; record: RunRecord }
  | { ok: false; error: string };

/**
 * Read the run record for a given run id.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  try {
    const record = new RunJournal(opts.runsDir).read(opts.runId);
    if (!record) return { ok: false, error: `No run found: ${opts.runId}` };
    return { ok: true, record };
  } catch (e) {
    return { ok: false, error: `Failed to read run: ${e instanceof Error ? e.message : String(e)}` };
  }
}

/**
 * List all runs with their current state, newest first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  return new RunJournal(runsDir).list();
}

/**
 * `runs_dir` from the layered config. Only this key is read, so a config
 * that does not yet name a project or service still works here.
 */
export function resolveRunsDir(opts: { configDir?: string; envName?: string; env?: NodeJS.ProcessEnv }): string {
  const raw = loadConfig(opts);
  return typeof raw.runs_dir === "string" && raw.runs_dir !== "" ? raw.runs_dir : DEFAULT_CONFIG.runs_dir;
}
