import { loadAjv, type ErrorObject } from "../schema/ajv.js";
import { DEFAULT_CONFIG, type ConvergeConfig } from "../types/config.js";
import type { RawConfig } from "./loader.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

const positiveSeconds = (def: number) => ({ type: "number", exclusiveMinimum: 0, default: def });

/** Config schema. Omitted keys are filled from DEFAULT_CONFIG by Ajv's `useDefaults`. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["project_id", "service_id"],
  additionalProperties: false,
  properties: {
    project_id: { type: "string", minLength: 1 },
    service_id: { type: "string", minLength: 1 },
    repo_dir: { type: "string", minLength: 1, default: DEFAULT_CONFIG.repo_dir },
    git_remote: { type: "string", minLength: 1, default: DEFAULT_CONFIG.git_remote },
    git_branch: { type: "string", minLength: 1, default: DEFAULT_CONFIG.git_branch },
    push: { type: "boolean", default: DEFAULT_CONFIG.push },
    cli_bin: { type: "string", minLength: 1, default: DEFAULT_CONFIG.cli_bin },
    builds_page_size: { type: "integer", minimum: 1, maximum: 100, default: DEFAULT_CONFIG.builds_page_size },
    poll_interval_sec: positiveSeconds(DEFAULT_CONFIG.poll_interval_sec),
    build_timeout_sec: positiveSeconds(DEFAULT_CONFIG.build_timeout_sec),
    deploy_timeout_sec: positiveSeconds(DEFAULT_CONFIG.deploy_timeout_sec),
    command_timeout_sec: positiveSeconds(DEFAULT_CONFIG.command_timeout_sec),
    unknown_status_policy: { type: "string", enum: ["poll", "fail"], default: DEFAULT_CONFIG.unknown_status_policy },
    runs_dir: { type: "string", minLength: 1, default: DEFAULT_CONFIG.runs_dir },
  },
} as const;

export type ConfigValidationResult =
  | { valid: true; config: ConvergeConfig; diagnostics: Diagnostic[] }
  | { valid: false; diagnostics: Diagnostic[] };

function schemaDiagnostic(err: ErrorObject): Diagnostic {
  const where = err.instancePath === "" ? "config" : err.instancePath.slice(1);
  return {
    level: "error",
    code: "CONFIG_SCHEMA",
    message: `${where} ${err.message ?? "is invalid"}`,
    path: err.instancePath,
  };
}

/** Poll cadence must fit inside each phase timeout, or the loop degenerates to a single tick. */
function checkPollWindows(config: ConvergeConfig): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const key of ["build_timeout_sec", "deploy_timeout_sec"] as const) {
    if (config.poll_interval_sec >= config[key]) {
      out.push({
        level: "error",
        code: "CONFIG_POLL_WINDOW",
        message: `poll_interval_sec (${config.poll_interval_sec}) must be smaller than ${key} (${config[key]})`,
        path: `/${key}`,
      });
    }
  }
  return out;
}

/** Validate a loaded config, filling defaults. The input object is not mutated. */
export function validateConfig(raw: RawConfig): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile<ConvergeConfig>(CONFIG_SCHEMA);
  const candidate: unknown = structuredClone(raw);

  if (!validate(candidate)) {
    return { valid: false, diagnostics: (validate.errors ?? []).map(schemaDiagnostic) };
  }

  const diagnostics = checkPollWindows(candidate);
  if (diagnostics.length > 0) return { valid: false, diagnostics };
  return { valid: true, config: candidate, diagnostics: [] };
}
