import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { isTerminal, type ConvergeState } from "./state-machine.js";

export type PhaseStats = { elapsedMs: number; attempts: number };

/**
 * Audit record of one invocation, stored at {runsDir}/{runId}/state.json.
 * Written at every transition and never read back to decide what a run does.
 */
export type RunRecord = {
  version: 1;
  runId: string;
  projectId: string;
  serviceId: string;
  pid: number;
  state: ConvergeState;
  revision: string | null;
  buildHandle: string | null;
  startedAt: string;
  updatedAt: string;
  finishedAt: string | null;
  transitions: Array<{ state: ConvergeState; at: string }>;
  phases: { build?: PhaseStats; deploy?: PhaseStats };
  error: { code: string; message: string } | null;
};

export type RunSummary = { runId: string; state: string; revision: string | null; updatedAt: string };

function nowIso(): string {
  return new Date().toISOString();
}

export function makeRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

function isRunRecord(val: unknown): val is RunRecord {
  if (val === null || typeof val !== "object") return false;
  return (
    "runId" in val && typeof val.runId === "string" &&
    "state" in val && typeof val.state === "string" &&
    "projectId" in val && typeof val.projectId === "string" &&
    "serviceId" in val && typeof val.serviceId === "string"
  );
}

export class RunJournal {
  constructor(private readonly runsDir: string) {}

  statePath(runId: string): string {
    return path.join(this.runsDir, runId, "state.json");
  }

  create(opts: { runId: string; projectId: string; serviceId: string }): RunRecord {
    const at = nowIso();
    const record: RunRecord = {
      version: 1,
      runId: opts.runId,
      projectId: opts.projectId,
      serviceId: opts.serviceId,
      pid: process.pid,
      state: "INIT",
      revision: null,
      buildHandle: null,
      startedAt: at,
      updatedAt: at,
      finishedAt: null,
      transitions: [{ state: "INIT", at }],
      phases: {},
      error: null,
    };
    this.save(record);
    return record;
  }

  /** Apply `patch`, stamp timestamps and persist. A changed `state` is appended to `transitions`. */
  update(record: RunRecord, patch: Partial<Omit<RunRecord, "version" | "runId" | "transitions">>): RunRecord {
    const at = nowIso();
    const next: RunRecord = { ...record, ...patch, updatedAt: at };
    if (patch.state !== undefined && patch.state !== record.state) {
      next.transitions = [...record.transitions, { state: patch.state, at }];
      if (isTerminal(patch.state)) next.finishedAt = at;
    }
    this.save(next);
    return next;
  }

  /**
   * Close a record whose run died on an unexpected error. The state stays where the run stopped;
   * `finishedAt` marks it as no longer active.
   */
  abandon(record: RunRecord, message: string): RunRecord {
    const at = nowIso();
    const next: RunRecord = { ...record, updatedAt: at, finishedAt: at, error: { code: "UNEXPECTED", message } };
    this.save(next);
    return next;
  }

  read(runId: string): RunRecord | null {
    const p = this.statePath(runId);
    if (!fs.existsSync(p)) return null;
    const parsed: unknown = JSON.parse(fs.readFileSync(p, "utf8"));
    if (!isRunRecord(parsed)) throw new Error(`Malformed run record: ${p}`);
    return parsed;
  }

  /** All readable run records, newest first. Unreadable records are listed with state "corrupted". */
  list(): RunSummary[] {
    if (!fs.existsSync(this.runsDir)) return [];
    const out: RunSummary[] = [];
    for (const entry of fs.readdirSync(this.runsDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      if (!fs.existsSync(this.statePath(entry.name))) continue;
      try {
        const rec = this.read(entry.name);
        if (rec) out.push({ runId: rec.runId, state: rec.state, revision: rec.revision, updatedAt: rec.updatedAt });
      } catch {
        out.push({ runId: entry.name, state: "corrupted", revision: null, updatedAt: "" });
      }
    }
    return out.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  /**
   * First unfinished run for the same project and service.
   * Only a live or killed process leaves such a record; `--force` overrides.
   */
  findActive(projectId: string, serviceId: string): RunRecord | null {
    for (const summary of this.list()) {
      if (summary.state === "corrupted") continue;
      const rec = this.read(summary.runId);
      if (!rec || isTerminal(rec.state) || rec.finishedAt !== null) continue;
      if (rec.projectId === projectId && rec.serviceId === serviceId) return rec;
    }
    return null;
  }

  private save(record: RunRecord): void {
    const p = this.statePath(record.runId);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, JSON.stringify(record, null, 2) + "\n", "utf8");
  }
}
