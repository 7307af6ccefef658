import fs from "node:fs";
import YAML from "yaml";
import type { DeploymentRecipe } from "../types/recipe.js";
import { SchemaRegistry } from "../schema/registry.js";
import { errorMessage } from "../core/errors.js";

export type RecipeLoadResult = { ok: true; recipe: DeploymentRecipe } | { ok: false; error: string };

/** Checks the schema cannot express. */
export function recipeProblems(recipe: DeploymentRecipe): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();
  for (const step of recipe.steps) {
    if (seen.has(step.id)) problems.push(`duplicate step id "${step.id}"`);
    seen.add(step.id);
  }
  if (recipe.healthcheck.timeout > recipe.healthcheck.interval) {
    problems.push("healthcheck timeout must not exceed its interval");
  }
  return problems;
}

export function loadRecipe(filePath: string, registry: SchemaRegistry = new SchemaRegistry()): RecipeLoadResult {
  if (!fs.existsSync(filePath)) {
    return { ok: false, error: `Recipe not found: ${filePath}` };
  }

  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    return { ok: false, error: `Failed to parse recipe ${filePath}: ${errorMessage(e)}` };
  }

  const checked = registry.check("recipe", doc);
  if (!checked.valid) return { ok: false, error: `Recipe invalid (${filePath}): ${checked.errors}` };

  const problems = recipeProblems(checked.value);
  if (problems.length > 0) return { ok: false, error: `Recipe invalid (${filePath}): ${problems.join("; ")}` };

  return { ok: true, recipe: checked.value };
}
