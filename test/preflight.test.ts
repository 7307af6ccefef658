import { describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { PreflightChecker } from "../src/preflight/checker.js";
import { FakeRuntime, tmpDir } from "./helpers.js";

function envFileIn(dir: string): string {
  const file = path.join(dir, ".env");
  fs.writeFileSync(file, "SUPPLIER_API_KEY=test-secret\n");
  return file;
}

describe("PreflightChecker", () => {
  it("passes when the runtime answers and the credentials file exists", async () => {
    const runtime = new FakeRuntime();
    const res = await new PreflightChecker(runtime, envFileIn(tmpDir("deployctl-pre-"))).check();
    expect(res).toEqual({ ok: true, value: undefined });
    expect(runtime.calls).toEqual(["info"]);
  });

  it("reports an unreachable runtime before looking for the file", async () => {
    const runtime = new FakeRuntime({ reachable: false });
    const res = await new PreflightChecker(runtime, "/nonexistent/.env").check();
    expect(res).toEqual({
      ok: false,
      error: {
        kind: "RuntimeUnavailable",
        detail: "Cannot connect to the Docker daemon at unix:///var/run/docker.sock",
      },
    });
  });

  it("reports the expected path of a missing credentials file", async () => {
    const file = path.join(tmpDir("deployctl-pre-"), ".env");
    const res = await new PreflightChecker(new FakeRuntime(), file).check();
    expect(res).toEqual({ ok: false, error: { kind: "ConfigMissing", path: file } });
  });

  it("does not accept a directory in place of the file", async () => {
    const dir = tmpDir("deployctl-pre-");
    fs.mkdirSync(path.join(dir, ".env"));
    const res = await new PreflightChecker(new FakeRuntime(), path.join(dir, ".env")).check();
    expect(res.ok).toBe(false);
  });
});
