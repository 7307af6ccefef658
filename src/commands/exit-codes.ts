import type { DeployError } from "../core/errors.js";
import type { DeploymentSession } from "../types/session.js";

/**
 * CLI exit codes. Zero only when the session ends `Running`.
 */
export const EXIT = {
  SUCCESS: 0,
  PREFLIGHT_FAILED: 1,
  BUILD_FAILED: 2,
  LAUNCH_FAILED: 3,
  HEALTH_TIMEOUT: 4,
  CONFIG_INVALID: 5,
} as const;

export function exitCodeForError(error: DeployError): number {
  switch (error.kind) {
    case "RuntimeUnavailable":
    case "ConfigMissing":
      return EXIT.PREFLIGHT_FAILED;
    case "StepFailed":
      return EXIT.BUILD_FAILED;
    case "LaunchError":
      return EXIT.LAUNCH_FAILED;
    case "HealthTimeout":
      return EXIT.HEALTH_TIMEOUT;
    case "ConfigInvalid":
      return EXIT.CONFIG_INVALID;
  }
}

export function exitCodeFor(session: DeploymentSession): number {
  if (session.phase === "Running") return EXIT.SUCCESS;
  return session.error ? exitCodeForError(session.error) : EXIT.LAUNCH_FAILED;
}
