import type { DeployError } from "../core/errors.js";

/** Deployment session — mutable state of one orchestration run. */
export type Phase =
  | "Idle"
  | "PreflightChecking"
  | "Stopping"
  | "Building"
  | "Starting"
  | "HealthChecking"
  | "Running"
  | "Failed";

export type StepRecord = {
  phase: Phase;
  /** 0 on success, the runtime's exit code (or 1) on failure. */
  exit_code: number;
  duration_ms: number;
  error?: string;
};

export type DeploymentSession = {
  phase: Phase;
  started_at: string;
  finished_at: string | null;
  steps: StepRecord[];
  log: string[];
  error: DeployError | null;
  /** Access endpoint, known once the instance was started. */
  url: string | null;
};
