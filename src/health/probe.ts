import type { HealthProbeConfig } from "../types/recipe.js";
import type { VerifyConfig } from "../types/config.js";

export type VerifyTiming = {
  graceMs: number;
  pollIntervalMs: number;
  timeoutMs: number;
};

/** Longest the runtime's own probe waits before declaring the instance unhealthy. */
export function probeWindowMs(probe: HealthProbeConfig): number {
  return (probe.start_period + probe.interval * probe.retries) * 1000;
}

/**
 * Launch-time verification defaults: grace = start_period,
 * timeout = start_period + retries × interval.
 */
export function verifyTiming(probe: HealthProbeConfig, verify: VerifyConfig): VerifyTiming {
  return {
    graceMs: verify.grace_ms ?? probe.start_period * 1000,
    pollIntervalMs: verify.poll_interval_ms,
    timeoutMs: verify.timeout_ms ?? probeWindowMs(probe),
  };
}

/**
 * start_period + interval × retries must outlast the worst-case cold start,
 * or a healthy instance gets marked unhealthy while still booting.
 */
export function probeInvariantViolation(probe: HealthProbeConfig, coldStartMs: number | undefined): string | null {
  if (coldStartMs === undefined) return null;
  const window = probeWindowMs(probe);
  if (window > coldStartMs) return null;
  return (
    `healthcheck window (start_period ${probe.start_period}s + ${probe.retries} × ${probe.interval}s = ${window / 1000}s) ` +
    `does not exceed cold start of ${coldStartMs / 1000}s`
  );
}

/** One GET against the health endpoint; any 2xx counts. */
export async function httpProbe(url: string, timeoutMs: number): Promise<boolean> {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    return res.ok;
  } catch {
    // Connection refused while the app boots is an ordinary negative answer.
    return false;
  }
}
