import type { Phase } from "../types/session.js";

/**
 * Mutating sequence in order. `Running` and `Failed` are terminal.
 */
export const SEQUENCE = [
  "PreflightChecking",
  "Stopping",
  "Building",
  "Starting",
  "HealthChecking",
] as const;

export type SequencePhase = (typeof SEQUENCE)[number];

export type TransitionEvent = "start" | "success" | "failure";

export function isTerminal(phase: Phase): phase is "Running" | "Failed" {
  return phase === "Running" || phase === "Failed";
}

/**
 * Pure function: given current phase + event, return next phase.
 */
export function nextPhase(current: Phase, event: TransitionEvent): Phase {
  if (isTerminal(current)) return current;

  if (current === "Idle") {
    return event === "start" ? "PreflightChecking" : current;
  }
  if (event === "start") return current;

  // Removing the previous instance never fails the session.
  if (current === "Stopping") return "Building";

  if (event === "failure") return "Failed";

  const idx = SEQUENCE.indexOf(current);
  if (idx >= SEQUENCE.length - 1) return "Running";
  return SEQUENCE[idx + 1];
}
