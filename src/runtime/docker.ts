import { processExecutor, type CommandExecutor, type CommandOutput } from "./exec.js";

export type InstanceHealth = "healthy" | "unhealthy" | "starting" | "none";

export type InstanceStatus = {
  name: string;
  exists: boolean;
  running: boolean;
  /** Runtime state string, e.g. "running", "exited". */
  state: string;
  health: InstanceHealth;
};

export type PortMapping = { host: number; container: number };

export type StartOptions = {
  name: string;
  image: string;
  ports: PortMapping[];
  envFile?: string;
};

export type BuildOptions = {
  tag: string;
  contextDir: string;
  dockerfile: string;
};

/**
 * The named instance and its image, as an identified external resource.
 * Create/remove are delegated to the runtime, whose operations are atomic.
 */
export interface ContainerRuntime {
  /** Lightweight status query; throws when the runtime is unreachable. */
  info(): Promise<void>;
  /** Idempotent: an absent instance resolves to "absent". */
  removeInstance(name: string): Promise<"removed" | "absent">;
  buildImage(opts: BuildOptions): Promise<void>;
  /** Detached start; resolves to the runtime's instance id. */
  startInstance(opts: StartOptions): Promise<string>;
  inspect(name: string): Promise<InstanceStatus>;
  logs(name: string, follow: boolean): Promise<number>;
}

export class RuntimeCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(args: string[], output: CommandOutput) {
    const lastLine = output.stderr.trim().split("\n").pop() ?? "";
    super(`docker ${args[0]} exited with code ${output.exitCode}${lastLine ? `: ${lastLine}` : ""}`);
    this.name = "RuntimeCommandError";
    this.args = args;
    this.exitCode = output.exitCode;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }

  /** Combined output, stdout first (BuildKit reports progress on stderr). */
  get output(): string {
    return [this.stdout, this.stderr].filter((s) => s.length > 0).join("\n");
  }
}

const NOT_FOUND = /no such (container|object)/i;

const HEALTH_VALUES: ReadonlySet<string> = new Set(["healthy", "unhealthy", "starting"]);

function toHealth(value: unknown): InstanceHealth {
  if (typeof value === "string" && HEALTH_VALUES.has(value)) {
    return value === "healthy" ? "healthy" : value === "unhealthy" ? "unhealthy" : "starting";
  }
  return "none";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse the `{{json .State}}` document of `docker inspect`. */
export function parseInstanceState(name: string, raw: string): InstanceStatus {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Unexpected inspect output for ${name}: ${raw.trim()}`);
  }
  const health = isRecord(parsed.Health) ? toHealth(parsed.Health.Status) : "none";
  return {
    name,
    exists: true,
    running: parsed.Running === true,
    state: typeof parsed.Status === "string" ? parsed.Status : "unknown",
    health,
  };
}

/**
 * Docker CLI wrapper. Every call goes through `docker <args>` without a shell.
 */
export class DockerCli implements ContainerRuntime {
  constructor(
    private readonly exec: CommandExecutor = processExecutor,
    private readonly binary = "docker",
  ) {}

  private async call(args: string[], input?: string): Promise<CommandOutput> {
    return this.exec.run(this.binary, args, { input });
  }

  async info(): Promise<void> {
    const args = ["info", "--format", "{{.ServerVersion}}"];
    const out = await this.call(args);
    if (out.exitCode !== 0) throw new RuntimeCommandError(args, out);
  }

  async removeInstance(name: string): Promise<"removed" | "absent"> {
    const args = ["rm", "--force", name];
    const out = await this.call(args);
    if (NOT_FOUND.test(out.stderr)) return "absent";
    if (out.exitCode !== 0) throw new RuntimeCommandError(args, out);
    return "removed";
  }

  async buildImage(opts: BuildOptions): Promise<void> {
    // Dockerfile on stdin; the context directory supplies staged files.
    const args = ["build", "--progress=plain", "--tag", opts.tag, "--file", "-", opts.contextDir];
    const out = await this.call(args, opts.dockerfile);
    if (out.exitCode !== 0) throw new RuntimeCommandError(args, out);
  }

  async startInstance(opts: StartOptions): Promise<string> {
    const args = ["run", "--detach", "--name", opts.name];
    for (const p of opts.ports) args.push("--publish", `${p.host}:${p.container}`);
    if (opts.envFile) args.push("--env-file", opts.envFile);
    args.push(opts.image);

    const out = await this.call(args);
    if (out.exitCode !== 0) throw new RuntimeCommandError(args, out);
    return out.stdout.trim();
  }

  async inspect(name: string): Promise<InstanceStatus> {
    const args = ["inspect", "--type", "container", "--format", "{{json .State}}", name];
    const out = await this.call(args);
    if (out.exitCode !== 0) {
      if (NOT_FOUND.test(out.stderr)) {
        return { name, exists: false, running: false, state: "missing", health: "none" };
      }
      throw new RuntimeCommandError(args, out);
    }
    return parseInstanceState(name, out.stdout);
  }

  async logs(name: string, follow: boolean): Promise<number> {
    const args = follow ? ["logs", "--follow", name] : ["logs", name];
    return this.exec.stream(this.binary, args);
  }
}
