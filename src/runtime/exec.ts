import { spawn } from "node:child_process";

export type CommandOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
};

/**
 * Process executor — abstracts child_process for testability.
 * `run` captures output; `stream` hands the terminal to the child.
 */
export interface CommandExecutor {
  run(file: string, args: string[], opts?: RunOptions): Promise<CommandOutput>;
  stream(file: string, args: string[]): Promise<number>;
}

export const MAX_CAPTURE = 4 * 1024 * 1024;

function append(buf: string, chunk: string): string {
  const next = buf + chunk;
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
}

export const processExecutor: CommandExecutor = {
  run(file, args, opts = {}) {
    return new Promise((resolve, reject) => {
      // No shell: arguments go to the binary verbatim.
      const child = spawn(file, args, {
        shell: false,
        stdio: ["pipe", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      // Decoded per stream so multi-byte characters survive chunk boundaries.
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdout = append(stdout, chunk);
      });
      child.stderr.on("data", (chunk: string) => {
        stderr = append(stderr, chunk);
      });

      // A child may exit before reading its input; its exit code and stderr still count.
      child.stdin.on("error", (e: NodeJS.ErrnoException) => {
        if (e.code !== "EPIPE") reject(e);
      });

      child.on("error", reject);
      child.on("close", (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      if (opts.input !== undefined) child.stdin.write(opts.input);
      child.stdin.end();
    });
  },

  stream(file, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(file, args, { shell: false, stdio: "inherit" });
      child.on("error", reject);
      child.on("close", (code) => resolve(code ?? 1));
    });
  },
};
