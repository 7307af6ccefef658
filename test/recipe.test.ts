import { describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { loadRecipe, recipeProblems } from "../src/recipe/loader.js";
import { healthUrl, renderDockerfile } from "../src/recipe/dockerfile.js";
import { identifyFailedStep, ImageBuilder, UNKNOWN_STEP } from "../src/recipe/builder.js";
import type { DeploymentRecipe } from "../src/types/recipe.js";
import { FakeRuntime, RECIPE_PATH, tmpDir } from "./helpers.js";

function bundled(): DeploymentRecipe {
  const res = loadRecipe(RECIPE_PATH);
  if (!res.ok) throw new Error(res.error);
  return res.recipe;
}

const EXPECTED_DOCKERFILE = [
  "FROM python:3.11-slim",
  "WORKDIR /app",
  "ENV PYTHONUNBUFFERED=1 PYTHONDONTWRITEBYTECODE=1 PIP_NO_CACHE_DIR=1",
  "RUN apt-get update && apt-get install -y build-essential curl && rm -rf /var/lib/apt/lists/*",
  "COPY requirements.txt .",
  "RUN pip install --upgrade pip && pip install -r requirements.txt",
  "RUN pip install faiss-cpu numpy streamlit pandas openpyxl plotly",
  "COPY . .",
  "EXPOSE 8501",
  "HEALTHCHECK --interval=30s --timeout=10s --start-period=5s --retries=3 CMD curl --fail http://localhost:8501/_stcore/health || exit 1",
  'CMD ["streamlit","run","streamlit_app/app.py","--server.port=8501","--server.address=0.0.0.0","--server.headless=true","--browser.serverAddress=localhost"]',
  "",
].join("\n");

describe("recipe loader", () => {
  it("loads the bundled recipe with steps in declared order", () => {
    const recipe = bundled();
    expect(recipe.steps.map((s) => s.id)).toEqual([
      "system-packages",
      "requirements",
      "supplemental-packages",
      "app-files",
    ]);
    expect(recipe.expose).toBe(8501);
    expect(recipe.healthcheck).toEqual({ interval: 30, timeout: 10, start_period: 5, retries: 3, path: "/_stcore/health" });
  });

  it("rejects a step of unknown kind", () => {
    const doc: unknown = YAML.parse(fs.readFileSync(RECIPE_PATH, "utf8"));
    const text = YAML.stringify(doc).replace("kind: stage-files", "kind: copy-everything");
    const file = path.join(tmpDir("deployctl-recipe-"), "recipe.yaml");
    fs.writeFileSync(file, text);
    const res = loadRecipe(file);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.startsWith(`Recipe invalid (${file}): `)).toBe(true);
  });

  it("reports duplicate step ids and an over-long probe timeout", () => {
    const recipe = bundled();
    const broken: DeploymentRecipe = {
      ...recipe,
      steps: [...recipe.steps, { id: "app-files", kind: "stage-files", source: "data", destination: "data" }],
      healthcheck: { ...recipe.healthcheck, timeout: 45 },
    };
    expect(recipeProblems(broken)).toEqual([
      'duplicate step id "app-files"',
      "healthcheck timeout must not exceed its interval",
    ]);
    expect(recipeProblems(recipe)).toEqual([]);
  });
});

describe("dockerfile", () => {
  it("renders the bundled recipe instruction by instruction", () => {
    expect(renderDockerfile(bundled())).toBe(EXPECTED_DOCKERFILE);
  });

  it("omits the ENV line when there are no flags and skips the installer upgrade when off", () => {
    const recipe = bundled();
    const text = renderDockerfile({
      ...recipe,
      env: [],
      steps: [{ id: "deps", kind: "dependency-manifest", manifest: "reqs.txt" }],
    });
    expect(text.split("\n").slice(0, 4)).toEqual([
      "FROM python:3.11-slim",
      "WORKDIR /app",
      "COPY reqs.txt .",
      "RUN pip install -r reqs.txt",
    ]);
  });

  it("builds the health URL on the mapped port", () => {
    expect(healthUrl(bundled(), "localhost", 9000)).toBe("http://localhost:9000/_stcore/health");
  });
});

describe("identifyFailedStep", () => {
  const steps = bundled().steps;

  it("names the step from a BuildKit error line", () => {
    const output = [
      "#7 [4/7] RUN pip install --upgrade pip && pip install -r requirements.txt",
      "#7 DONE 31.2s",
      "#8 [5/7] RUN pip install faiss-cpu numpy streamlit pandas openpyxl plotly",
      "#8 2.104 ERROR: Could not find a version that satisfies the requirement faiss-cpu",
      '#8 ERROR: process "/bin/sh -c pip install faiss-cpu numpy streamlit pandas openpyxl plotly" did not complete successfully: exit code: 1',
    ].join("\n");
    expect(identifyFailedStep(output, steps)).toBe("supplemental-packages");
  });

  it("names the step from a legacy builder message", () => {
    const output =
      "The command '/bin/sh -c apt-get update && apt-get install -y build-essential curl && rm -rf /var/lib/apt/lists/*' returned a non-zero code: 100";
    expect(identifyFailedStep(output, steps)).toBe("system-packages");
  });

  it("falls back to the last step echoed in the output", () => {
    const output = [
      "#5 [2/7] RUN apt-get update && apt-get install -y build-essential curl && rm -rf /var/lib/apt/lists/*",
      "#5 DONE 12.0s",
      "#6 [3/7] COPY requirements.txt .",
      "#6 ERROR: failed to calculate checksum: not found",
    ].join("\n");
    expect(identifyFailedStep(output, steps)).toBe("requirements");
  });

  it("returns unknown when no step appears", () => {
    expect(identifyFailedStep("ERROR: failed to solve: python:3.11-slim: not found", steps)).toBe(UNKNOWN_STEP);
  });
});

describe("ImageBuilder", () => {
  it("hands the rendered Dockerfile to the runtime", async () => {
    const runtime = new FakeRuntime();
    const res = await new ImageBuilder(runtime, { tag: "supplier-matcher:latest", contextDir: "/srv/app" }).build(bundled());
    expect(res).toEqual({ ok: true, value: { tag: "supplier-matcher:latest", dockerfile: EXPECTED_DOCKERFILE } });
    expect(runtime.calls).toEqual(["build supplier-matcher:latest"]);
    expect(runtime.lastDockerfile).toBe(EXPECTED_DOCKERFILE);
  });

  it("returns StepFailed with the output tail and exit code", async () => {
    const output = Array.from({ length: 25 }, (_, i) => `line ${i + 1}`)
      .concat(['ERROR: process "/bin/sh -c pip install faiss-cpu numpy streamlit pandas openpyxl plotly" did not complete successfully: exit code: 1'])
      .join("\n");
    const runtime = new FakeRuntime({ buildFailureOutput: output });
    const res = await new ImageBuilder(runtime, { tag: "t:1", contextDir: "." }).build(bundled());
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.stepId).toBe("supplemental-packages");
    expect(res.error.exitCode).toBe(1);
    const detail = res.error.detail.split("\n");
    expect(detail).toHaveLength(20);
    expect(detail[0]).toBe("line 7");
    expect(runtime.images.size).toBe(0);
  });
});
