import type { DeploymentRecipe, RecipeStep } from "../types/recipe.js";

/**
 * Instructions for one recipe step. Each RUN stays on a single line so the
 * runtime echoes it back verbatim when it fails.
 */
export function renderStep(step: RecipeStep): string[] {
  switch (step.kind) {
    case "system-packages":
      return [
        `RUN apt-get update && apt-get install -y ${step.packages.join(" ")} && rm -rf /var/lib/apt/lists/*`,
      ];
    case "dependency-manifest": {
      const install = `pip install -r ${step.manifest}`;
      return [
        `COPY ${step.manifest} .`,
        step.upgrade_installer ? `RUN pip install --upgrade pip && ${install}` : `RUN ${install}`,
      ];
    }
    case "supplemental-packages":
      return [`RUN pip install ${step.packages.join(" ")}`];
    case "stage-files":
      return [`COPY ${step.source} ${step.destination}`];
  }
}

export function healthUrl(recipe: DeploymentRecipe, host = "localhost", port = recipe.expose): string {
  return `http://${host}:${port}${recipe.healthcheck.path}`;
}

export function renderHealthcheck(recipe: DeploymentRecipe): string {
  const h = recipe.healthcheck;
  return (
    `HEALTHCHECK --interval=${h.interval}s --timeout=${h.timeout}s --start-period=${h.start_period}s --retries=${h.retries} ` +
    `CMD curl --fail ${healthUrl(recipe)} || exit 1`
  );
}

/** Render the recipe in declared order. */
export function renderDockerfile(recipe: DeploymentRecipe): string {
  const lines: string[] = [`FROM ${recipe.base_image}`, `WORKDIR ${recipe.workdir}`];

  if (recipe.env.length > 0) {
    lines.push(`ENV ${recipe.env.map((e) => `${e.name}=${e.value}`).join(" ")}`);
  }

  for (const step of recipe.steps) {
    lines.push(...renderStep(step));
  }

  lines.push(`EXPOSE ${recipe.expose}`);
  lines.push(renderHealthcheck(recipe));
  lines.push(`CMD ${JSON.stringify([recipe.command.program, ...recipe.command.args])}`);

  return lines.join("\n") + "\n";
}
