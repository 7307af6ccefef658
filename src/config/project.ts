import path from "node:path";
import type { DeployConfig } from "../types/config.js";
import type { DeploymentRecipe } from "../types/recipe.js";
import { DEFAULT_CONFIG_DIR } from "../paths.js";
import { SchemaRegistry } from "../schema/registry.js";
import { loadConfig } from "./loader.js";
import { loadRecipe } from "../recipe/loader.js";
import { probeInvariantViolation, verifyTiming, type VerifyTiming } from "../health/probe.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export function diag(level: Diagnostic["level"], code: string, message: string, filePath?: string): Diagnostic {
  return filePath ? { level, code, message, path: filePath } : { level, code, message };
}

/** Config and recipe resolved against the working directory. */
export type Project = {
  config: DeployConfig;
  recipe: DeploymentRecipe;
  configDir: string;
  recipePath: string;
  envFile: string;
  contextDir: string;
  timing: VerifyTiming;
};

export type ProjectOpts = {
  configDir?: string;
  envName?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type ProjectResult = { ok: true; project: Project } | { ok: false; errors: Diagnostic[] };

export function loadProject(opts: ProjectOpts = {}): ProjectResult {
  const cwd = opts.cwd ?? process.cwd();
  const configDir = opts.configDir ? path.resolve(cwd, opts.configDir) : DEFAULT_CONFIG_DIR;
  const registry = new SchemaRegistry();

  const loaded = loadConfig({ envName: opts.envName, configDir, env: opts.env, registry });
  if (!loaded.ok) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid (${configDir}): ${loaded.error}`, configDir)] };
  }
  const config = loaded.config;

  const recipePath = path.resolve(configDir, config.recipe);
  const recipe = loadRecipe(recipePath, registry);
  if (!recipe.ok) {
    return { ok: false, errors: [diag("error", "RECIPE_INVALID", recipe.error, recipePath)] };
  }

  const violation = probeInvariantViolation(recipe.recipe.healthcheck, config.verify.cold_start_ms);
  if (violation) {
    return { ok: false, errors: [diag("error", "PROBE_WINDOW_TOO_SHORT", violation, recipePath)] };
  }

  return {
    ok: true,
    project: {
      config,
      recipe: recipe.recipe,
      configDir,
      recipePath,
      envFile: path.resolve(cwd, config.env_file),
      contextDir: path.resolve(cwd, config.context_dir),
      timing: verifyTiming(recipe.recipe.healthcheck, config.verify),
    },
  };
}
