import fs from "node:fs";
import type { PreflightError } from "../core/errors.js";
import { errorMessage } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";
import type { ContainerRuntime } from "../runtime/docker.js";

/**
 * Preflight gate: read-only checks run before any mutating action, in order,
 * stopping at the first failure.
 */
export class PreflightChecker {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly envFilePath: string,
  ) {}

  async check(): Promise<Result<void, PreflightError>> {
    try {
      await this.runtime.info();
    } catch (e) {
      return err({ kind: "RuntimeUnavailable", detail: errorMessage(e) });
    }

    if (!fs.existsSync(this.envFilePath) || !fs.statSync(this.envFilePath).isFile()) {
      return err({ kind: "ConfigMissing", path: this.envFilePath });
    }

    return ok(undefined);
  }
}
