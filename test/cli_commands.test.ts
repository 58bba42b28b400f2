import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { resolveRunsDir } from "../src/commands/status.js";
import { validateAll } from "../src/commands/validate.js";
import { FAILURE_STATES } from "../src/core/state-machine.js";

describe("exit-codes", () => {
  it("maps CONVERGED to success", () => {
    expect(exitCodeFor("CONVERGED")).toBe(0);
  });

  it("gives every failure state its own code", () => {
    const codes = FAILURE_STATES.map((s) => exitCodeFor(s));
    expect(new Set(codes).size).toBe(FAILURE_STATES.length);
    expect(codes).not.toContain(EXIT.SUCCESS);
    expect(codes).not.toContain(EXIT.INVALID_ARGS);
    expect(codes).not.toContain(EXIT.CONCURRENT_RUN);
  });

  it("keeps the documented values", () => {
    expect(exitCodeFor("BUILD_TIMEOUT")).toBe(14);
    expect(exitCodeFor("DEPLOY_TIMEOUT")).toBe(16);
    expect(exitCodeFor("CANCELLED")).toBe(130);
  });
});

describe("validate command", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "converge-validate-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("accepts a complete config", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "project_id: p\nservice_id: s\n");
    const res = validateAll({ configDir: tmpDir, env: {} });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.config.poll_interval_sec).toBe(5);
  });

  it("picks up env overrides before validating", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "project_id: p\nservice_id: s\n");
    const res = validateAll({ configDir: tmpDir, env: { CONVERGE_DEPLOY_TIMEOUT_SEC: "5" } });
    expect(res).toEqual({
      ok: false,
      errors: [
        {
          level: "error",
          code: "CONFIG_POLL_WINDOW",
          message: "poll_interval_sec (5) must be smaller than deploy_timeout_sec (5)",
          path: "/deploy_timeout_sec",
        },
      ],
    });
  });

  it("reports YAML parse failures as CONFIG_PARSE", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "project_id: [unclosed\n");
    const res = validateAll({ configDir: tmpDir, env: {} });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["CONFIG_PARSE"]);
  });
});

describe("status runs dir", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "converge-status-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads runs_dir from config even without a service", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "runs_dir: /var/lib/converge/runs\n");
    expect(resolveRunsDir({ configDir: tmpDir, env: {} })).toBe("/var/lib/converge/runs");
  });

  it("falls back to the default", () => {
    expect(resolveRunsDir({ configDir: tmpDir, env: {} })).toBe(".converge/runs");
  });

  it("honours the env override", () => {
    expect(resolveRunsDir({ configDir: tmpDir, env: { CONVERGE_RUNS_DIR: "/tmp/runs" } })).toBe("/tmp/runs");
  });
});
