import type { ServiceConfig } from "../types/config.js";
import type { DeploymentRecipe } from "../types/recipe.js";
import type { DeploymentSession, Phase } from "../types/session.js";
import type { BuildError, DeployError, HealthTimeout, LaunchError, PreflightError } from "./errors.js";
import { errorMessage, stepExitCode } from "./errors.js";
import { err, ok, pipeline, type Result, type Stage } from "./result.js";
import { nextPhase, type SequencePhase } from "./state-machine.js";
import type { ContainerRuntime } from "../runtime/docker.js";
import { RuntimeCommandError } from "../runtime/docker.js";
import type { ImageHandle } from "../recipe/builder.js";
import type { VerifyTiming } from "../health/probe.js";
import type { BrowserHook } from "../report/browser.js";
import { formatHuman, phaseLine, type ReportLine, type StatusReporter } from "../report/reporter.js";

export type DeployerDeps = {
  runtime: ContainerRuntime;
  preflight: { check(): Promise<Result<void, PreflightError>> };
  builder: { build(recipe: DeploymentRecipe): Promise<Result<ImageHandle, BuildError>> };
  verifier: {
    waitForHealthy(instanceId: string, timeoutMs: number, pollIntervalMs: number): Promise<Result<void, HealthTimeout>>;
  };
  reporter: StatusReporter;
  openBrowser?: BrowserHook;
  now?: () => number;
};

export type DeployPlan = {
  service: ServiceConfig;
  recipe: DeploymentRecipe;
  envFile: string;
  timing: VerifyTiming;
};

export function newSession(now: Date = new Date()): DeploymentSession {
  return {
    phase: "Idle",
    started_at: now.toISOString(),
    finished_at: null,
    steps: [],
    log: [],
    error: null,
    url: null,
  };
}

/**
 * Lifecycle controller — drives one session through
 * preflight → stop → build → start → health check.
 *
 * Every step returns a Result; the pipeline stops at the first failure, so
 * nothing mutating runs once the session is `Failed`.
 */
export class Deployer {
  private readonly now: () => number;

  constructor(
    private readonly deps: DeployerDeps,
    private readonly plan: DeployPlan,
  ) {
    this.now = deps.now ?? Date.now;
  }

  async run(): Promise<DeploymentSession> {
    const session = newSession(new Date(this.now()));
    const { service } = this.plan;
    let image: ImageHandle | null = null;

    const stages: Stage<SequencePhase, DeployError>[] = [
      {
        name: "PreflightChecking",
        run: async () => {
          const checked = await this.deps.preflight.check();
          if (checked.ok) {
            this.note(session, {
              level: "ok",
              code: "PREFLIGHT_OK",
              message: `Container runtime reachable, ${this.plan.envFile} present`,
            });
          }
          return checked;
        },
      },
      { name: "Stopping", run: () => this.stopExisting(session) },
      {
        name: "Building",
        run: async () => {
          const built = await this.deps.builder.build(this.plan.recipe);
          if (built.ok) image = built.value;
          return built;
        },
      },
      {
        name: "Starting",
        run: async () => {
          if (!image) return err<LaunchError>({ kind: "LaunchError", detail: "no image was built" });
          return this.start(session, image);
        },
      },
      {
        name: "HealthChecking",
        run: () =>
          this.deps.verifier.waitForHealthy(service.name, this.plan.timing.timeoutMs, this.plan.timing.pollIntervalMs),
      },
    ];

    this.transition(session, nextPhase(session.phase, "start"));

    const outcome = await pipeline(
      stages,
      {
        settle: (phase, result, durationMs) => {
          session.steps.push({
            phase,
            exit_code: result.ok ? 0 : stepExitCode(result.error),
            duration_ms: durationMs,
            ...(result.ok ? {} : { error: result.error.kind }),
          });
          this.transition(session, nextPhase(phase, result.ok ? "success" : "failure"));
        },
      },
      this.now,
    );

    if (!outcome.ok) session.error = outcome.error;

    if (session.phase === "Running" && session.url) {
      await this.tryOpenBrowser(session, session.url);
    }

    session.finished_at = new Date(this.now()).toISOString();
    this.deps.reporter.report(session, { serviceName: service.name, hostPort: service.host_port });
    return session;
  }

  private transition(session: DeploymentSession, phase: Phase): void {
    session.phase = phase;
    session.log.push(formatHuman(phaseLine(phase)));
    // The terminal line comes with the final report.
    if (phase !== "Running" && phase !== "Failed") this.deps.reporter.phase(phase);
  }

  private note(session: DeploymentSession, line: ReportLine): void {
    session.log.push(formatHuman(line));
    this.deps.reporter.emit(line);
  }

  /** Idempotent; never fails the session. */
  private async stopExisting(session: DeploymentSession): Promise<Result<void, never>> {
    const name = this.plan.service.name;
    try {
      const outcome = await this.deps.runtime.removeInstance(name);
      this.note(session, {
        level: "info",
        code: outcome === "removed" ? "INSTANCE_REMOVED" : "NO_PREVIOUS_INSTANCE",
        message: outcome === "removed" ? `Removed previous instance ${name}` : `No previous instance ${name}`,
      });
    } catch (e) {
      this.note(session, {
        level: "warn",
        code: "STOP_IGNORED",
        message: `Could not remove previous instance ${name}: ${errorMessage(e)}`,
      });
    }
    return ok(undefined);
  }

  private async start(session: DeploymentSession, image: ImageHandle): Promise<Result<string, LaunchError>> {
    const { service, recipe, envFile } = this.plan;
    try {
      const id = await this.deps.runtime.startInstance({
        name: service.name,
        image: image.tag,
        ports: [{ host: service.host_port, container: recipe.expose }],
        envFile,
      });
      session.url = `http://localhost:${service.host_port}`;
      this.note(session, { level: "info", code: "INSTANCE_STARTED", message: `Started ${service.name} (${id.slice(0, 12)})` });
      return ok(id);
    } catch (e) {
      if (e instanceof RuntimeCommandError) {
        return err({ kind: "LaunchError", detail: e.stderr.trim() || e.message, exitCode: e.exitCode });
      }
      return err({ kind: "LaunchError", detail: errorMessage(e) });
    }
  }

  private async tryOpenBrowser(session: DeploymentSession, url: string): Promise<void> {
    if (!this.deps.openBrowser) return;
    try {
      await this.deps.openBrowser(url);
    } catch (e) {
      this.note(session, { level: "warn", code: "BROWSER_UNAVAILABLE", message: `Could not open a browser: ${errorMessage(e)}` });
    }
  }
}
