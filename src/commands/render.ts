import fs from "node:fs";
import path from "node:path";
import { loadProject, type Diagnostic, type ProjectOpts } from "../config/project.js";
import { renderDockerfile } from "../recipe/dockerfile.js";

export type RenderResult =
  | { ok: true; dockerfile: string; writtenTo: string | null }
  | { ok: false; errors: Diagnostic[] };

export function render(opts: ProjectOpts & { out?: string }): RenderResult {
  const loaded = loadProject(opts);
  if (!loaded.ok) return { ok: false, errors: loaded.errors };

  const dockerfile = renderDockerfile(loaded.project.recipe);
  if (!opts.out) return { ok: true, dockerfile, writtenTo: null };

  const target = path.resolve(opts.cwd ?? process.cwd(), opts.out);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, dockerfile, "utf8");
  return { ok: true, dockerfile, writtenTo: target };
}
