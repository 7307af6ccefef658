import type { OutputFormat } from "../types/config.js";
import type { DeploymentSession, Phase } from "../types/session.js";
import { describeError, type DeployError } from "../core/errors.js";

export type LineLevel = "info" | "ok" | "warn" | "error" | "detail";

export type ReportLine = {
  level: LineLevel;
  code: string;
  message: string;
  phase?: Phase;
};

export type OutputSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const consoleSink: OutputSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export type ReportContext = {
  serviceName: string;
  hostPort: number;
};

const PHASE_MESSAGES: Record<Phase, string> = {
  Idle: "Idle",
  PreflightChecking: "Checking environment",
  Stopping: "Stopping previous instance",
  Building: "Building image",
  Starting: "Starting instance",
  HealthChecking: "Waiting for the service to report healthy",
  Running: "Service is running",
  Failed: "Deployment failed",
};

const PREFIX: Record<LineLevel, string> = {
  info: "→",
  ok: "✓",
  warn: "!",
  error: "✗",
  detail: "  |",
};

export const FOLLOW_UP_COMMANDS = {
  logs: "deployctl logs --follow",
  stop: "deployctl down",
} as const;

export function formatHuman(line: ReportLine): string {
  return `${PREFIX[line.level]} ${line.message}`;
}

export function formatJsonl(line: ReportLine): string {
  return JSON.stringify(line);
}

export function phaseLine(phase: Phase): ReportLine {
  return { level: "info", code: "PHASE", message: PHASE_MESSAGES[phase], phase };
}

/** Remediation per failure kind: what to do, not just that it failed. */
export function remediationFor(error: DeployError, ctx?: ReportContext): string[] {
  switch (error.kind) {
    case "RuntimeUnavailable":
      return ["Start Docker (Docker Desktop or the docker daemon), then run deployctl again."];
    case "ConfigMissing":
      return [`Create ${error.path} containing the upstream API keys, then run deployctl again.`];
    case "StepFailed":
      return [`Inspect the build output for step "${error.stepId}" above, fix the recipe or its inputs, then rebuild.`];
    case "LaunchError":
      if (!ctx) return ["Inspect the runtime logs (docker logs) and check for port conflicts."];
      return [
        `Inspect the runtime logs: docker logs ${ctx.serviceName}`,
        `Check that port ${ctx.hostPort} is not already in use.`,
      ];
    case "HealthTimeout":
      return [
        "The instance may not have started correctly.",
        `Inspect its logs: ${FOLLOW_UP_COMMANDS.logs}`,
      ];
    case "ConfigInvalid":
      return ["Fix the configuration, then check it with: deployctl validate"];
  }
}

function detailLines(error: DeployError): string[] {
  if (error.kind === "StepFailed" || error.kind === "LaunchError") {
    return error.detail.split("\n").filter((l) => l.trim().length > 0);
  }
  return [];
}

/** Terminal summary. Pure. */
export function outcomeLines(session: DeploymentSession, ctx?: ReportContext): ReportLine[] {
  if (session.phase === "Running") {
    const lines: ReportLine[] = [{ level: "ok", code: "DEPLOYED", message: "Deployment succeeded", phase: "Running" }];
    if (session.url) lines.push({ level: "info", code: "ENDPOINT", message: `Web UI: ${session.url}` });
    lines.push({ level: "info", code: "LOGS_COMMAND", message: `View logs: ${FOLLOW_UP_COMMANDS.logs}` });
    lines.push({ level: "info", code: "STOP_COMMAND", message: `Stop service: ${FOLLOW_UP_COMMANDS.stop}` });
    return lines;
  }

  if (!session.error) {
    return [{ level: "error", code: "INCOMPLETE", message: `Deployment ended in phase ${session.phase}`, phase: session.phase }];
  }

  const error = session.error;
  // A health timeout leaves the instance possibly up: warn rather than declare total failure.
  const level: LineLevel = error.kind === "HealthTimeout" ? "warn" : "error";
  return [
    { level, code: error.kind, message: describeError(error), phase: session.phase },
    ...detailLines(error).map((message): ReportLine => ({ level: "detail", code: "DETAIL", message })),
    ...remediationFor(error, ctx).map((message): ReportLine => ({ level: "warn", code: "REMEDIATION", message })),
  ];
}

/**
 * Status reporter — formats and writes; holds no deployment state.
 */
export class StatusReporter {
  constructor(
    private readonly format: OutputFormat = "human",
    private readonly sink: OutputSink = consoleSink,
  ) {}

  render(line: ReportLine): string {
    return this.format === "jsonl" ? formatJsonl(line) : formatHuman(line);
  }

  emit(line: ReportLine): void {
    const text = this.render(line);
    if (this.format === "human" && (line.level === "error" || line.level === "detail")) {
      this.sink.err(text);
    } else {
      this.sink.out(text);
    }
  }

  phase(phase: Phase): void {
    this.emit(phaseLine(phase));
  }

  report(session: DeploymentSession, ctx?: ReportContext): void {
    for (const line of outcomeLines(session, ctx)) this.emit(line);
  }
}
