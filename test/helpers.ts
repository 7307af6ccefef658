import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { BuildOptions, ContainerRuntime, InstanceHealth, InstanceStatus, StartOptions } from "../src/runtime/docker.js";
import { RuntimeCommandError } from "../src/runtime/docker.js";
import type { OutputSink } from "../src/report/reporter.js";

export const CONFIG_DIR = fileURLToPath(new URL("../config", import.meta.url));
export const RECIPE_PATH = path.join(CONFIG_DIR, "recipe.yaml");

export const INSTANCE_ID = "0123456789abcdef0123456789abcdef";

export type FakeRuntimeOptions = {
  reachable?: boolean;
  /** Instance already present before the run. */
  existing?: string[];
  removeError?: string;
  /** When set, the build fails and the runtime prints this. */
  buildFailureOutput?: string;
  startError?: string;
  /** Health reported by successive inspects; the last value repeats. */
  health?: InstanceHealth[];
  /** State of a started instance; "running" unless overridden. */
  state?: string;
};

type FakeInstance = { image: string; ports: StartOptions["ports"]; envFile?: string };

/**
 * In-process stand-in for the docker CLI. Starting a name that already exists
 * fails the way the real runtime does, so a skipped stop shows up in tests.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: string[] = [];
  readonly instances = new Map<string, FakeInstance>();
  readonly images = new Set<string>();
  lastDockerfile: string | null = null;
  private readonly health: InstanceHealth[];

  constructor(private readonly opts: FakeRuntimeOptions = {}) {
    for (const name of opts.existing ?? []) this.instances.set(name, { image: "old:tag", ports: [] });
    this.health = [...(opts.health ?? ["healthy"])];
  }

  async info(): Promise<void> {
    this.calls.push("info");
    if (this.opts.reachable === false) {
      throw new Error("Cannot connect to the Docker daemon at unix:///var/run/docker.sock");
    }
  }

  async removeInstance(name: string): Promise<"removed" | "absent"> {
    this.calls.push(`rm ${name}`);
    if (this.opts.removeError) throw new Error(this.opts.removeError);
    return this.instances.delete(name) ? "removed" : "absent";
  }

  async buildImage(opts: BuildOptions): Promise<void> {
    this.calls.push(`build ${opts.tag}`);
    this.lastDockerfile = opts.dockerfile;
    if (this.opts.buildFailureOutput !== undefined) {
      throw new RuntimeCommandError(["build"], { exitCode: 1, stdout: "", stderr: this.opts.buildFailureOutput });
    }
    this.images.add(opts.tag);
  }

  async startInstance(opts: StartOptions): Promise<string> {
    this.calls.push(`run ${opts.name}`);
    const fail = (stderr: string) => new RuntimeCommandError(["run"], { exitCode: 125, stdout: "", stderr });
    if (this.opts.startError) throw fail(this.opts.startError);
    if (this.instances.has(opts.name)) throw fail(`Conflict. The container name "/${opts.name}" is already in use`);
    if (!this.images.has(opts.image)) throw fail(`Unable to find image '${opts.image}' locally`);
    this.instances.set(opts.name, { image: opts.image, ports: opts.ports, envFile: opts.envFile });
    return INSTANCE_ID + "\n";
  }

  async inspect(name: string): Promise<InstanceStatus> {
    this.calls.push(`inspect ${name}`);
    if (!this.instances.has(name)) {
      return { name, exists: false, running: false, state: "missing", health: "none" };
    }
    const health = this.health.length > 1 ? (this.health.shift() ?? "none") : (this.health[0] ?? "none");
    const state = this.opts.state ?? "running";
    return { name, exists: true, running: state === "running", state, health };
  }

  async logs(name: string, follow: boolean): Promise<number> {
    this.calls.push(follow ? `logs -f ${name}` : `logs ${name}`);
    return 0;
  }
}

/** Clock whose sleep advances time instantly. */
export function fakeClock(start = 0) {
  let t = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => t,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      t += ms;
    },
  };
}

export function captureSink(): OutputSink & { outLines: string[]; errLines: string[] } {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return {
    outLines,
    errLines,
    out: (line) => outLines.push(line),
    err: (line) => errLines.push(line),
  };
}

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
