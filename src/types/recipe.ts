/** Deployment recipe — declarative description of the runnable image. */
export type EnvFlag = {
  name: string;
  value: string;
};

export type SystemPackagesStep = {
  id: string;
  kind: "system-packages";
  packages: string[];
};

export type DependencyManifestStep = {
  id: string;
  kind: "dependency-manifest";
  manifest: string;
  upgrade_installer?: boolean;
};

/** Packages the manifest does not capture, installed as their own step. */
export type SupplementalPackagesStep = {
  id: string;
  kind: "supplemental-packages";
  packages: string[];
};

export type StageFilesStep = {
  id: string;
  kind: "stage-files";
  source: string;
  destination: string;
};

export type RecipeStep =
  | SystemPackagesStep
  | DependencyManifestStep
  | SupplementalPackagesStep
  | StageFilesStep;

/** Durations in seconds. */
export type HealthProbeConfig = {
  interval: number;
  timeout: number;
  start_period: number;
  retries: number;
  path: string;
};

export type StartupCommand = {
  program: string;
  args: string[];
};

export type DeploymentRecipe = {
  base_image: string;
  workdir: string;
  env: EnvFlag[];
  steps: RecipeStep[];
  expose: number;
  healthcheck: HealthProbeConfig;
  command: StartupCommand;
};
