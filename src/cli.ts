#!/usr/bin/env node

import { Command } from "commander";
import type { OutputFormat } from "./types/config.js";
import { up } from "./commands/up.js";
import { validateAll, type Diagnostic } from "./commands/validate.js";
import { render } from "./commands/render.js";
import { status, down, logs } from "./commands/instance.js";
import { EXIT } from "./commands/exit-codes.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat };

const program = new Command();

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory (default: bundled config)")
    .option("--env <name>", "Environment overlay: loads config/<name>.yaml over base.yaml")
    .option("--format <format>", "Output format: human|jsonl", "human");
}

function printDiagnostics(diagnostics: Diagnostic[], format: OutputFormat): void {
  for (const d of diagnostics) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(d) + "\n");
    } else if (d.level === "error") {
      console.error(d.message);
    } else {
      console.log(d.message);
    }
  }
}

async function launch(opts: CommonOpts & { open: boolean }): Promise<void> {
  const res = await up({ configDir: opts.config, envName: opts.env, format: opts.format, open: opts.open });
  process.exit(res.exitCode);
}

withCommonOptions(program)
  .name("deployctl")
  .description("Build, launch and health-check the supplier-matcher container")
  .version("0.1.0")
  // Root options only before a command name, so each command keeps its own --config.
  .enablePositionalOptions()
  .option("--no-open", "Do not open the web UI in a browser")
  .action(launch);

withCommonOptions(program.command("up"))
  .description("Same as running deployctl without a command")
  .option("--no-open", "Do not open the web UI in a browser")
  .action(launch);

withCommonOptions(program.command("validate"))
  .description("Validate config and recipe, including the health probe window")
  .action((opts: CommonOpts) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });
    if (!res.ok) {
      printDiagnostics(res.errors, opts.format);
      process.exit(EXIT.CONFIG_INVALID);
    }
    printDiagnostics(res.diagnostics, opts.format);
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

withCommonOptions(program.command("render"))
  .description("Print the Dockerfile rendered from the recipe")
  .option("--out <file>", "Write to a file instead of stdout")
  .action((opts: CommonOpts & { out?: string }) => {
    const res = render({ configDir: opts.config, envName: opts.env, out: opts.out });
    if (!res.ok) {
      printDiagnostics(res.errors, opts.format);
      process.exit(EXIT.CONFIG_INVALID);
    }
    if (res.writtenTo) {
      console.log(`Wrote ${res.writtenTo}`);
    } else {
      process.stdout.write(res.dockerfile);
    }
  });

withCommonOptions(program.command("status"))
  .description("Show whether the instance is running and healthy")
  .action(async (opts: CommonOpts) => {
    const res = await status({ configDir: opts.config, envName: opts.env });
    if (!res.ok) {
      if (res.errors) printDiagnostics(res.errors, opts.format);
      else console.error(res.error);
      process.exit(1);
    }
    const s = res.value;
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(s) + "\n");
    } else if (!s.exists) {
      console.log(`${s.name}: not deployed`);
    } else {
      console.log(`${s.name}: ${s.state}, health ${s.health}`);
    }
    if (!s.running) process.exit(1);
  });

withCommonOptions(program.command("logs"))
  .description("Show instance logs")
  .option("-f, --follow", "Stream new log lines")
  .action(async (opts: CommonOpts & { follow?: boolean }) => {
    const res = await logs({ configDir: opts.config, envName: opts.env, follow: opts.follow ?? false });
    if (!res.ok) {
      if (res.errors) printDiagnostics(res.errors, opts.format);
      else console.error(res.error);
      process.exit(1);
    }
    process.exit(res.value);
  });

withCommonOptions(program.command("down"))
  .description("Stop and remove the instance")
  .action(async (opts: CommonOpts) => {
    const res = await down({ configDir: opts.config, envName: opts.env });
    if (!res.ok) {
      if (res.errors) printDiagnostics(res.errors, opts.format);
      else console.error(res.error);
      process.exit(1);
    }
    const message = res.value.outcome === "removed" ? `Removed ${res.value.name}` : `${res.value.name} was not running`;
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: res.value.outcome.toUpperCase(), message }) + "\n");
    } else {
      console.log(message);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
