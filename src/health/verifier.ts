import type { HealthTimeout } from "../core/errors.js";
import { errorMessage } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";
import type { ContainerRuntime, InstanceStatus } from "../runtime/docker.js";

export type Observation = { healthy: boolean; status: string };

export type HealthVerifierOptions = {
  /** Sleep before the first poll, covering cold start. */
  graceMs: number;
  /** Endpoint checked while the runtime still reports "starting". */
  healthUrl?: string;
  probe?: (url: string) => Promise<boolean>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Health verifier — bounded, best-effort observation of a launched instance.
 * It never restarts anything; the caller decides what a timeout means.
 */
export class HealthVerifier {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly opts: HealthVerifierOptions,
  ) {
    this.sleep = opts.sleep ?? sleep;
    this.now = opts.now ?? Date.now;
  }

  async observe(instanceId: string): Promise<Observation> {
    let status: InstanceStatus;
    try {
      status = await this.runtime.inspect(instanceId);
    } catch (e) {
      return { healthy: false, status: `inspect failed: ${errorMessage(e)}` };
    }

    if (!status.exists) return { healthy: false, status: "missing" };
    if (!status.running) return { healthy: false, status: status.state };
    if (status.health === "healthy") return { healthy: true, status: "healthy" };
    if (status.health === "unhealthy") return { healthy: false, status: "unhealthy" };

    if (this.opts.healthUrl && this.opts.probe && (await this.opts.probe(this.opts.healthUrl))) {
      return { healthy: true, status: "endpoint healthy" };
    }
    return { healthy: false, status: status.health === "starting" ? "starting" : "running, endpoint not ready" };
  }

  async waitForHealthy(
    instanceId: string,
    timeoutMs: number,
    pollIntervalMs: number,
  ): Promise<Result<void, HealthTimeout>> {
    const started = this.now();
    await this.sleep(this.opts.graceMs);

    for (;;) {
      const observation = await this.observe(instanceId);
      if (observation.healthy) return ok(undefined);

      const elapsedMs = this.now() - started;
      if (elapsedMs >= timeoutMs) {
        return err({ kind: "HealthTimeout", elapsedMs, lastStatus: observation.status });
      }
      await this.sleep(Math.min(pollIntervalMs, timeoutMs - elapsedMs));
    }
  }
}
