import { spawn } from "node:child_process";
import { LocalEnvironmentError } from "./errors";

export interface LaunchRequest {
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Merged over the parent environment. */
  env?: Record<string, string>;
  /**
   * "capture" buffers stdout/stderr into the result; "inherit" streams them
   * to the terminal (interactive runs such as local emulation).
   */
  stdio?: "capture" | "inherit";
}

export interface LaunchResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program. The only way the core touches local processes.
 */
export interface ProcessLauncher {
  run(request: LaunchRequest): Promise<LaunchResult>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export class NodeProcessLauncher implements ProcessLauncher {
  run(request: LaunchRequest): Promise<LaunchResult> {
    const inherit = request.stdio === "inherit";

    return new Promise<LaunchResult>((resolve, reject) => {
      const child = spawn(request.command, [...request.args], {
        cwd: request.cwd,
        env: { ...process.env, ...(request.env ?? {}) },
        stdio: inherit ? "inherit" : ["ignore", "pipe", "pipe"]
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (err: unknown) => {
        if (isErrnoException(err) && err.code === "ENOENT") {
          reject(
            new LocalEnvironmentError(`Command not found: "${request.command}". Install it or add it to your PATH.`)
          );
          return;
        }
        reject(err);
      });

      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({
          exitCode: code ?? (signal ? 128 : 1),
          stdout: Buffer.concat(stdout).toString("utf-8"),
          stderr: Buffer.concat(stderr).toString("utf-8")
        });
      });
    });
  }
}
