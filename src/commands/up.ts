import type { OutputFormat } from "../types/config.js";
import type { DeploymentSession } from "../types/session.js";
import { loadProject } from "../config/project.js";
import { Deployer, newSession } from "../core/deployer.js";
import { DockerCli, type ContainerRuntime } from "../runtime/docker.js";
import { PreflightChecker } from "../preflight/checker.js";
import { ImageBuilder } from "../recipe/builder.js";
import { healthUrl } from "../recipe/dockerfile.js";
import { HealthVerifier, type HealthVerifierOptions } from "../health/verifier.js";
import { httpProbe } from "../health/probe.js";
import { browserHook, type BrowserHook } from "../report/browser.js";
import { StatusReporter, type OutputSink } from "../report/reporter.js";
import { exitCodeFor } from "./exit-codes.js";

export type UpOpts = {
  configDir?: string;
  envName?: string;
  cwd?: string;
  format?: OutputFormat;
  /** false disables the browser hook regardless of config. */
  open?: boolean;
  runtime?: ContainerRuntime;
  sink?: OutputSink;
  /** Overrides platform detection; null means never open. */
  browser?: BrowserHook | null;
  clock?: Pick<HealthVerifierOptions, "sleep" | "now">;
  probe?: (url: string) => Promise<boolean>;
};

export type UpResult = {
  exitCode: number;
  session: DeploymentSession;
};

/**
 * The zero-argument launch: preflight, replace the instance, verify, report.
 */
export async function up(opts: UpOpts = {}): Promise<UpResult> {
  const reporter = new StatusReporter(opts.format ?? "human", opts.sink);

  const loaded = loadProject({ configDir: opts.configDir, envName: opts.envName, cwd: opts.cwd });
  if (!loaded.ok) {
    const session = newSession();
    session.phase = "Failed";
    session.error = { kind: "ConfigInvalid", message: loaded.errors.map((d) => d.message).join("; ") };
    session.finished_at = new Date().toISOString();
    reporter.report(session);
    return { exitCode: exitCodeFor(session), session };
  }

  const { config, recipe, envFile, contextDir, timing } = loaded.project;
  const runtime = opts.runtime ?? new DockerCli();

  const probeTimeoutMs = recipe.healthcheck.timeout * 1000;
  const verifier = new HealthVerifier(runtime, {
    graceMs: timing.graceMs,
    healthUrl: healthUrl(recipe, "localhost", config.service.host_port),
    probe: opts.probe ?? ((url) => httpProbe(url, probeTimeoutMs)),
    sleep: opts.clock?.sleep,
    now: opts.clock?.now,
  });

  const openBrowser =
    opts.browser === null ? undefined : (opts.browser ?? browserHook(config.open_browser && opts.open !== false));

  const deployer = new Deployer(
    {
      runtime,
      preflight: new PreflightChecker(runtime, envFile),
      builder: new ImageBuilder(runtime, { tag: config.service.image, contextDir }),
      verifier,
      reporter,
      openBrowser,
      now: opts.clock?.now,
    },
    { service: config.service, recipe, envFile, timing },
  );

  const session = await deployer.run();
  return { exitCode: exitCodeFor(session), session };
}
