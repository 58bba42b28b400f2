import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export type RawConfig = Record<string, unknown>;

/** Nearest `config/` holding base.yaml above this module, from sources or from dist/. */
function findConfigDir(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, "config");
    if (fs.existsSync(path.join(candidate, "base.yaml"))) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve("config");
    dir = parent;
  }
}

export const ENV_PREFIX = "CONVERGE_";

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isPlainObject(val) && isPlainObject(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply CONVERGE_ prefixed environment variable overrides.
 * Values stay strings; the validator coerces them to each key's schema type.
 */
function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const result: RawConfig = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // CONVERGE_BUILD_TIMEOUT_SEC → build_timeout_sec
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    result[configKey] = value;
  }
  return result;
}

export type LoadConfigOpts = {
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RawConfig;
};

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables ← overrides.
 *
 * The result is unvalidated; pass it through `validateConfig` before use.
 */
export function loadConfig(opts: LoadConfigOpts = {}): RawConfig {
  const dir = opts.configDir ?? findConfigDir();

  let merged = loadYaml(path.join(dir, "base.yaml"));

  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }

  merged = applyEnvOverrides(merged, opts.env ?? process.env);

  if (opts.overrides) {
    merged = deepMerge(merged, opts.overrides);
  }

  return merged;
}
