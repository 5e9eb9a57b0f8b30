import { spawn } from "node:child_process";

export interface CommandResult {
  ok: boolean;
  stdout: Buffer;
  stderr: string;
  reason?: string;
}

export interface RunCommandOptions {
  cwd?: string | undefined;
  timeoutMs?: number | undefined;
  maxStderrBytes?: number | undefined;
}

export type CommandRunner = (command: string, args: string[], options?: RunCommandOptions) => Promise<CommandResult>;

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const DEFAULT_MAX_STDERR_BYTES = 64 * 1024;

function trimToTailWithinBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) return value;
  let low = 0;
  let high = value.length;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const sliced = value.slice(mid);
    if (Buffer.byteLength(sliced, "utf8") > maxBytes) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return value.slice(low);
}

/**
 * Runs a command without a shell. Stdout is kept in full as raw bytes; stderr
 * keeps only its tail for diagnostics.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxStderrBytes = options.maxStderrBytes ?? DEFAULT_MAX_STDERR_BYTES;

  return new Promise((resolveResult) => {
    const stdoutChunks: Buffer[] = [];
    let stderr = "";
    let done = false;
    let timedOut = false;

    const collectStdout = (): Buffer => Buffer.concat(stdoutChunks);

    const resolveOnce = (value: CommandResult): void => {
      if (done) return;
      done = true;
      clearTimeout(timeoutHandle);
      resolveResult(value);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });

    child.stdout.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr = trimToTailWithinBytes(stderr + chunk, maxStderrBytes);
    });

    child.on("error", (error) => {
      resolveOnce({
        ok: false,
        stdout: collectStdout(),
        stderr,
        reason: error.message
      });
    });

    child.on("close", (code) => {
      if (timedOut) {
        resolveOnce({
          ok: false,
          stdout: collectStdout(),
          stderr,
          reason: `timeout after ${timeoutMs / 1000}s`
        });
        return;
      }

      if (code !== 0) {
        resolveOnce({
          ok: false,
          stdout: collectStdout(),
          stderr,
          reason: `exit code ${code ?? "unknown"}`
        });
        return;
      }

      resolveOnce({
        ok: true,
        stdout: collectStdout(),
        stderr
      });
    });

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);
  });
}
