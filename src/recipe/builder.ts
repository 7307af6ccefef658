import type { DeploymentRecipe, RecipeStep } from "../types/recipe.js";
import type { BuildError } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";
import { RuntimeCommandError, type ContainerRuntime } from "../runtime/docker.js";
import { renderDockerfile, renderStep } from "./dockerfile.js";

export type ImageHandle = {
  tag: string;
  dockerfile: string;
};

export const UNKNOWN_STEP = "unknown";

const ERROR_LINE = /ERROR|did not complete successfully|returned a non-zero code/;

const DETAIL_LINES = 20;

function squash(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Text the runtime prints for a step: the instruction minus its keyword. */
function signatures(step: RecipeStep): string[] {
  return renderStep(step).map((line) => squash(line.replace(/^(RUN|COPY)\s+/, "")));
}

/**
 * Identify the recipe step whose instruction the runtime reported as failing.
 * Error lines are preferred; otherwise the last step echoed in the output wins.
 */
export function identifyFailedStep(output: string, steps: RecipeStep[]): string {
  const lines = output.split("\n").map(squash);
  const match = (line: string) => steps.find((s) => signatures(s).some((sig) => line.includes(sig)));

  for (const line of lines) {
    if (!ERROR_LINE.test(line)) continue;
    const step = match(line);
    if (step) return step.id;
  }

  for (let i = lines.length - 1; i >= 0; i--) {
    const step = match(lines[i]);
    if (step) return step.id;
  }

  return UNKNOWN_STEP;
}

function tail(output: string, count: number): string {
  return output.trimEnd().split("\n").slice(-count).join("\n");
}

/**
 * Image builder — renders the recipe and blocks until the runtime reports
 * success or failure. A failed build yields no handle.
 */
export class ImageBuilder {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly opts: { tag: string; contextDir: string },
  ) {}

  async build(recipe: DeploymentRecipe): Promise<Result<ImageHandle, BuildError>> {
    const dockerfile = renderDockerfile(recipe);
    try {
      await this.runtime.buildImage({ tag: this.opts.tag, contextDir: this.opts.contextDir, dockerfile });
    } catch (e) {
      if (e instanceof RuntimeCommandError) {
        return err({
          kind: "StepFailed",
          stepId: identifyFailedStep(e.output, recipe.steps),
          detail: tail(e.output, DETAIL_LINES),
          exitCode: e.exitCode,
        });
      }
      return err({ kind: "StepFailed", stepId: UNKNOWN_STEP, detail: e instanceof Error ? e.message : String(e) });
    }
    return ok({ tag: this.opts.tag, dockerfile });
  }
}
