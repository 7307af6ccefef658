/** Failure taxonomy. Each kind maps to its own remediation in the reporter. */
export type RuntimeUnavailable = { kind: "RuntimeUnavailable"; detail: string };
export type ConfigMissing = { kind: "ConfigMissing"; path: string };
export type PreflightError = RuntimeUnavailable | ConfigMissing;

export type BuildError = { kind: "StepFailed"; stepId: string; detail: string; exitCode?: number };

export type LaunchError = { kind: "LaunchError"; detail: string; exitCode?: number };

export type HealthTimeout = { kind: "HealthTimeout"; elapsedMs: number; lastStatus: string };

export type ConfigInvalid = { kind: "ConfigInvalid"; message: string };

export type DeployError = PreflightError | BuildError | LaunchError | HealthTimeout | ConfigInvalid;

export function describeError(error: DeployError): string {
  switch (error.kind) {
    case "RuntimeUnavailable":
      return `Container runtime is not reachable: ${error.detail}`;
    case "ConfigMissing":
      return `Configuration file not found: ${error.path}`;
    case "StepFailed":
      return `Build step "${error.stepId}" failed`;
    case "LaunchError":
      return "Failed to start instance";
    case "HealthTimeout":
      return `Instance not healthy after ${Math.round(error.elapsedMs / 1000)}s (last status: ${error.lastStatus})`;
    case "ConfigInvalid":
      return `Invalid configuration: ${error.message}`;
  }
}

/** Exit code to record for a failed step. */
export function stepExitCode(error: DeployError): number {
  if (error.kind === "StepFailed" || error.kind === "LaunchError") return error.exitCode ?? 1;
  return 1;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
