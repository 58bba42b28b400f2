import { loadConfig, type RawConfig } from "../config/loader.js";
import { validateConfig, type Diagnostic } from "../config/validator.js";
import type { ConvergeConfig } from "../types/config.js";

export type ValidateResult = { ok: true; config: ConvergeConfig } | { ok: false; errors: Diagnostic[] };

/** Load the layered config and report every problem with it. */
export function validateAll(opts: { configDir?: string; envName?: string; env?: NodeJS.ProcessEnv }): ValidateResult {
  let raw: RawConfig;
  try {
    raw = loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env });
  } catch (e) {
    return {
      ok: false,
      errors: [{ level: "error", code: "CONFIG_PARSE", message: e instanceof Error ? e.message : String(e) }],
    };
  }

  const res = validateConfig(raw);
  if (!res.valid) return { ok: false, errors: res.diagnostics };
  return { ok: true, config: res.config };
}
