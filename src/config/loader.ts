import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { DeployConfig } from "../types/config.js";
import { DEFAULT_CONFIG_DIR } from "../paths.js";
import { SchemaRegistry } from "../schema/registry.js";

export const ENV_PREFIX = "DEPLOYCTL_";

type Doc = Record<string, unknown>;

function isDoc(value: unknown): value is Doc {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Doc, override: Doc): Doc {
  const result: Doc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isDoc(val) && isDoc(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Doc {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isDoc(parsed)) throw new Error(`Expected a mapping at the top of ${filePath}`);
  return parsed;
}

/** "false" → false, "8501" → 8501; anything structured stays a string. */
function parseScalar(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return parsed === null || typeof parsed === "object" ? value : parsed;
  } catch {
    return value;
  }
}

/** Apply DEPLOYCTL_ prefixed environment variable overrides to top-level keys. */
function applyEnvOverrides(config: Doc, env: NodeJS.ProcessEnv): Doc {
  const result: Doc = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // DEPLOYCTL_ENV_FILE → env_file
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    result[configKey] = parseScalar(value);
  }
  return result;
}

/**
 * Merge layers: base.yaml ← {envName}.yaml ← environment variables.
 * Returns the raw document; {@link loadConfig} validates it.
 */
export function loadConfigLayers(
  envName?: string,
  configDir: string = DEFAULT_CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): Doc {
  const base = loadYaml(path.join(configDir, "base.yaml"));
  const merged = envName ? deepMerge(base, loadYaml(path.join(configDir, `${envName}.yaml`))) : base;
  return applyEnvOverrides(merged, env);
}

export type ConfigLoadResult = { ok: true; config: DeployConfig } | { ok: false; error: string };

export function loadConfig(opts: {
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  registry?: SchemaRegistry;
} = {}): ConfigLoadResult {
  let raw: Doc;
  try {
    raw = loadConfigLayers(opts.envName, opts.configDir, opts.env);
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }

  const registry = opts.registry ?? new SchemaRegistry();
  const checked = registry.check("config", raw);
  if (!checked.valid) return { ok: false, error: checked.errors };
  return { ok: true, config: checked.value };
}
