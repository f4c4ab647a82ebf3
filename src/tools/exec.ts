import { spawn } from "node:child_process";
import { CancelledError } from "../errors.js";

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  env?: Record<string, string>;
  cwd?: string;
  /** Kill the child when this aborts. The promise then rejects with CancelledError. */
  signal?: AbortSignal;
  /** Hard limit for a single invocation. Long-running applies and installs pass their own. */
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000;

export function execCmd(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    if (opts?.signal?.aborted) {
      reject(abortReason(opts.signal, cmd));
      return;
    }

    const child = spawn(cmd, args, {
      env: { ...process.env, ...(opts?.env ?? {}) },
      cwd: opts?.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const killTimeout = setTimeout(() => {
      timedOut = child.kill();
    }, timeoutMs);

    const onAbort = () => {
      child.kill();
    };
    opts?.signal?.addEventListener("abort", onAbort, { once: true });

    const finish = () => {
      settled = true;
      clearTimeout(killTimeout);
      opts?.signal?.removeEventListener("abort", onAbort);
    };

    child.stdout?.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr?.on("data", (d: Buffer) => (stderr += d.toString()));

    child.on("error", (err: NodeJS.ErrnoException) => {
      if (settled) return;
      finish();

      // Missing binary is reported like a shell would, not as a crash
      if (err.code === "ENOENT") {
        resolve({
          code: 127,
          stdout: "",
          stderr: `Command not found: ${cmd}. Install it or put it on PATH.`,
        });
      } else {
        reject(err);
      }
    });

    child.on("close", (code) => {
      if (settled) return;
      finish();

      if (opts?.signal?.aborted) {
        reject(abortReason(opts.signal, cmd));
        return;
      }

      if (timedOut) {
        stderr += `\nCommand timed out after ${timeoutMs / 1000}s and was killed: ${cmd} ${args.join(" ")}`;
      }

      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });
  });
}

function abortReason(signal: AbortSignal, cmd: string): CancelledError {
  return new CancelledError(`running ${cmd}`, { cause: signal.reason });
}
