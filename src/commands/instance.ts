import { loadProject, type Diagnostic, type ProjectOpts } from "../config/project.js";
import { errorMessage } from "../core/errors.js";
import { DockerCli, type ContainerRuntime, type InstanceStatus } from "../runtime/docker.js";

export type InstanceOpts = ProjectOpts & { runtime?: ContainerRuntime };

export type InstanceResult<T> = { ok: true; value: T } | { ok: false; error: string; errors?: Diagnostic[] };

function resolve(opts: InstanceOpts): { ok: true; name: string; runtime: ContainerRuntime } | { ok: false; errors: Diagnostic[] } {
  const loaded = loadProject(opts);
  if (!loaded.ok) return loaded;
  return { ok: true, name: loaded.project.config.service.name, runtime: opts.runtime ?? new DockerCli() };
}

/** Is the named instance there, running, healthy? */
export async function status(opts: InstanceOpts): Promise<InstanceResult<InstanceStatus>> {
  const target = resolve(opts);
  if (!target.ok) return { ok: false, error: "Invalid configuration", errors: target.errors };
  try {
    return { ok: true, value: await target.runtime.inspect(target.name) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/** Remove the instance. Absent is success. */
export async function down(opts: InstanceOpts): Promise<InstanceResult<{ name: string; outcome: "removed" | "absent" }>> {
  const target = resolve(opts);
  if (!target.ok) return { ok: false, error: "Invalid configuration", errors: target.errors };
  try {
    const outcome = await target.runtime.removeInstance(target.name);
    return { ok: true, value: { name: target.name, outcome } };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/** Stream instance logs to the terminal; resolves to the runtime's exit code. */
export async function logs(opts: InstanceOpts & { follow: boolean }): Promise<InstanceResult<number>> {
  const target = resolve(opts);
  if (!target.ok) return { ok: false, error: "Invalid configuration", errors: target.errors };
  try {
    return { ok: true, value: await target.runtime.logs(target.name, opts.follow) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}
