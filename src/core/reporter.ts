import type { ConvergeState } from "./state-machine.js";

export type OutputFormat = "human" | "jsonl";

export type ProgressEvent =
  | { code: "REVISION_RESOLVED"; revision: string }
  | { code: "PUBLISHED"; revision: string; skipped: boolean }
  | { code: "BUILD_SUBMITTED"; revision: string; handle: string }
  | { code: "BUILD_POLL"; handle: string; status: string; elapsedMs: number; error?: string }
  | { code: "BUILD_OK"; handle: string; elapsedMs: number }
  | { code: "DEPLOY_REQUESTED"; revision: string }
  | { code: "DEPLOY_POLL"; deployed: string; expected: string; elapsedMs: number; error?: string }
  | { code: "CONVERGED"; revision: string; elapsedMs: number }
  | { code: "FAILED"; state: ConvergeState; message: string };

export interface Reporter {
  emit(event: ProgressEvent): void;
}

export type ReporterSinks = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const PREFIX = "[converge]";

const defaultSinks: ReporterSinks = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

/** Strip control characters so remote-provided text cannot forge log lines. */
export function sanitizeLogText(text: string): string {
  return text.replace(/[\u0000-\u001f\u007f]+/g, " ").trim();
}

function sec(ms: number): number {
  return Math.round(ms / 1000);
}

function phaseOf(event: ProgressEvent): string {
  switch (event.code) {
    case "REVISION_RESOLVED":
      return "resolve";
    case "PUBLISHED":
      return "publish";
    case "BUILD_SUBMITTED":
    case "BUILD_POLL":
    case "BUILD_OK":
      return "build";
    case "DEPLOY_REQUESTED":
    case "DEPLOY_POLL":
    case "CONVERGED":
      return "deploy";
    case "FAILED":
      return "converge";
  }
}

/** One line per event, in the fixed format log-based monitors match on. */
export function formatHuman(event: ProgressEvent): string {
  const errSuffix = (e?: string) => (e ? ` error=${sanitizeLogText(e)}` : "");
  switch (event.code) {
    case "REVISION_RESOLVED":
      return `${PREFIX} sha=${event.revision}`;
    case "PUBLISHED":
      return event.skipped
        ? `${PREFIX} publish skipped sha=${event.revision}`
        : `${PREFIX} published sha=${event.revision}`;
    case "BUILD_SUBMITTED":
      return `${PREFIX} build submitted build_id=${event.handle}`;
    case "BUILD_POLL":
      return `${PREFIX} build status=${sanitizeLogText(event.status) || "PENDING"} elapsed=${sec(event.elapsedMs)}s${errSuffix(event.error)}`;
    case "BUILD_OK":
      return `${PREFIX} build success build_id=${event.handle} elapsed=${sec(event.elapsedMs)}s`;
    case "DEPLOY_REQUESTED":
      return `${PREFIX} deployment requested sha=${event.revision}`;
    case "DEPLOY_POLL":
      return `${PREFIX} waiting deploy deployed=${sanitizeLogText(event.deployed)} elapsed=${sec(event.elapsedMs)}s${errSuffix(event.error)}`;
    case "CONVERGED":
      return `${PREFIX} converged sha=${event.revision} elapsed=${sec(event.elapsedMs)}s`;
    case "FAILED":
      return `${PREFIX}[ERR] ${event.state} ${sanitizeLogText(event.message)}`;
  }
}

/** A failure outside the run's own events: bad arguments, a refused start, an unexpected error. */
export function formatFatal(format: OutputFormat, message: string, fields: Record<string, unknown> = {}): string {
  if (format === "jsonl") {
    return JSON.stringify({ level: "error", code: "EXIT", ...fields, error: sanitizeLogText(message) });
  }
  return `${PREFIX}[ERR] ${sanitizeLogText(message)}`;
}

export function formatJsonl(event: ProgressEvent): string {
  const { code, ...rest } = event;
  const record: Record<string, unknown> = {
    level: code === "FAILED" ? "error" : "info",
    code,
    phase: phaseOf(event),
  };
  for (const [key, value] of Object.entries(rest)) {
    if (value === undefined) continue;
    if (key === "elapsedMs" && typeof value === "number") {
      record.elapsedSec = sec(value);
    } else {
      record[key] = typeof value === "string" ? sanitizeLogText(value) : value;
    }
  }
  return JSON.stringify(record);
}

export class StreamReporter implements Reporter {
  constructor(
    private readonly format: OutputFormat,
    private readonly sinks: ReporterSinks = defaultSinks,
  ) {}

  emit(event: ProgressEvent): void {
    if (this.format === "jsonl") {
      this.sinks.out(formatJsonl(event));
      return;
    }
    const line = formatHuman(event);
    if (event.code === "FAILED") this.sinks.err(line);
    else this.sinks.out(line);
  }
}

/** Collects events in memory. */
export class MemoryReporter implements Reporter {
  readonly events: ProgressEvent[] = [];

  emit(event: ProgressEvent): void {
    this.events.push(event);
  }
}
