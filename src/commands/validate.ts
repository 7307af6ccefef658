import { loadProject, diag, type Diagnostic, type ProjectOpts } from "../config/project.js";
import { probeWindowMs } from "../health/probe.js";

export type { Diagnostic };

export type ValidateResult = { ok: true; diagnostics: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

/** Config + recipe + health probe window, without touching the runtime. */
export function validateAll(opts: ProjectOpts = {}): ValidateResult {
  const loaded = loadProject(opts);
  if (!loaded.ok) return { ok: false, errors: loaded.errors };

  const { config, recipe, recipePath, timing } = loaded.project;
  const diagnostics: Diagnostic[] = [
    diag("info", "RECIPE_OK", `Recipe ${recipePath}: ${recipe.steps.length} steps, port ${recipe.expose}`, recipePath),
    diag(
      "info",
      "VERIFY_TIMING",
      `Grace ${timing.graceMs}ms, poll every ${timing.pollIntervalMs}ms, timeout ${timing.timeoutMs}ms`,
    ),
  ];

  if (timing.timeoutMs < probeWindowMs(recipe.healthcheck)) {
    diagnostics.push(
      diag(
        "warn",
        "VERIFY_SHORTER_THAN_PROBE",
        `Launch verification gives up after ${timing.timeoutMs}ms, before the runtime's own probe window of ${probeWindowMs(recipe.healthcheck)}ms`,
      ),
    );
  }
  if (config.service.host_port !== recipe.expose) {
    diagnostics.push(
      diag("info", "PORT_REMAPPED", `Host port ${config.service.host_port} maps to container port ${recipe.expose}`),
    );
  }

  return { ok: true, diagnostics };
}
