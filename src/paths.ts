import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/** Nearest ancestor of this module holding a package.json (works from src/ and dist/src/). */
function findPackageRoot(start: string): string {
  let dir = start;
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
}

export const PACKAGE_ROOT = findPackageRoot(path.dirname(fileURLToPath(import.meta.url)));

export const DEFAULT_CONFIG_DIR = path.join(PACKAGE_ROOT, "config");

export const DEFAULT_SCHEMA_DIR = path.join(PACKAGE_ROOT, "schemas");
