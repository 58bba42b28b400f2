import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { RemoteError, SubmissionError, errorMessage, type RemoteErrorKind } from "../core/errors.js";
import type { BuildHandle, BuildRecord, RemoteControlClient, Revision } from "./client.js";

const pExecFile = promisify(execFile);

export type CommandRunner = (bin: string, args: string[], timeoutMs: number) => Promise<string>;

/** Runs the CLI and returns stdout; a non-zero exit rejects with the child's error. */
export const execCommand: CommandRunner = async (bin, args, timeoutMs) => {
  const { stdout } = await pExecFile(bin, args, { timeout: timeoutMs, maxBuffer: 16 * 1024 * 1024 });
  return stdout;
};

export type NorthflankCliOpts = {
  projectId: string;
  serviceId: string;
  branch: string;
  bin?: string;
  commandTimeoutMs?: number;
  run?: CommandRunner;
};

type JsonObject = Record<string, unknown>;

function isObject(val: unknown): val is JsonObject {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

function str(val: unknown): string {
  return typeof val === "string" ? val : "";
}

/** The CLI prints either the payload itself or `{ data: payload }`. */
function payload(obj: JsonObject): JsonObject {
  return isObject(obj.data) ? obj.data : obj;
}

function stderrOf(e: unknown): string {
  if (isObject(e) && typeof e.stderr === "string") return e.stderr.trim();
  return "";
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// 408 and 429 are worth retrying at the next tick.
const RETRYABLE_4XX = new Set([408, 429]);
const TEXT_STATUS = /\b(?:HTTP|status|error)[\s:=]*([45]\d\d)\b/i;

function isRejectedStatus(status: number): boolean {
  return status >= 400 && status < 500 && !RETRYABLE_4XX.has(status);
}

/**
 * A failed command is `rejected` when the control plane answered with a client error: a JSON
 * `{ error: {...} }` body without a 5xx status, or text naming a 4xx status. Anything else is
 * `transport`.
 */
export function classifyFailure(stderr: string): RemoteErrorKind {
  const parsed = parseJson(stderr);
  if (isObject(parsed) && isObject(parsed.error)) {
    const status = parsed.error.status;
    if (typeof status !== "number") return "rejected";
    return isRejectedStatus(status) ? "rejected" : "transport";
  }
  const match = TEXT_STATUS.exec(stderr);
  if (match && isRejectedStatus(Number(match[1]))) return "rejected";
  return "transport";
}

/**
 * Control-plane client backed by the `northflank` CLI (`--output json`).
 */
export class NorthflankCliClient implements RemoteControlClient {
  private readonly bin: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(private readonly opts: NorthflankCliOpts) {
    this.bin = opts.bin ?? "northflank";
    this.timeoutMs = opts.commandTimeoutMs ?? 60_000;
    this.run = opts.run ?? execCommand;
  }

  private target(): string[] {
    return ["--projectId", this.opts.projectId, "--serviceId", this.opts.serviceId];
  }

  private async call(args: string[]): Promise<JsonObject> {
    const fullArgs = [...args, "--output", "json"];
    let stdout: string;
    try {
      stdout = await this.run(this.bin, fullArgs, this.timeoutMs);
    } catch (e) {
      const stderr = stderrOf(e);
      const detail = stderr || errorMessage(e);
      throw new RemoteError(`${this.bin} ${args.slice(0, 3).join(" ")}: ${detail}`, classifyFailure(stderr), {
        cause: e,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (e) {
      throw new RemoteError(`${this.bin} ${args.slice(0, 3).join(" ")}: output is not JSON`, "protocol", { cause: e });
    }
    if (!isObject(parsed)) {
      throw new RemoteError(`${this.bin} ${args.slice(0, 3).join(" ")}: expected a JSON object`, "protocol");
    }
    return parsed;
  }

  async submitBuild(revision: Revision): Promise<BuildHandle> {
    const res = await this.call([
      "start", "service", "build",
      ...this.target(),
      "--input", JSON.stringify({ sha: revision }),
    ]);
    const id = str(payload(res).id);
    if (id === "") throw new SubmissionError("build id missing from acknowledgement");
    return id;
  }

  async listRecentBuilds(limit: number): Promise<BuildRecord[]> {
    const res = await this.call([
      "get", "service", "builds",
      ...this.target(),
      "--per_page", String(limit),
    ]);
    const builds = payload(res).builds;
    if (!Array.isArray(builds)) return [];
    return builds.filter(isObject).map((b) => ({
      handle: str(b.id),
      revision: str(b.sha),
      rawStatus: str(b.status),
    }));
  }

  async requestDeployment(revision: Revision): Promise<void> {
    await this.call([
      "update", "service", "deployment",
      ...this.target(),
      "--input", JSON.stringify({ branch: this.opts.branch, buildSHA: revision }),
    ]);
  }

  async getDeployedRevision(): Promise<Revision> {
    const res = await this.call(["get", "service", "deployment", ...this.target()]);
    const internal = payload(res).internal;
    return isObject(internal) ? str(internal.deployedSHA) : "";
  }
}
