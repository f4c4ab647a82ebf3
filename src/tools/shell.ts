import { execCmd } from "./exec.js";
import { RemoteCallError } from "../errors.js";
import type { Logger } from "../logger.js";
import { LogKeys } from "../logger.js";

export type ShellResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  env?: Record<string, string>;
  cwd?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
};

/** Runs one external command to completion and captures both streams. */
export interface CommandRunner {
  run(cmd: string, args: string[], opts?: RunOptions): Promise<ShellResult>;
}

/**
 * Runner backed by child processes. The credential entries are merged into
 * every command's environment; per-call entries win.
 */
export function createShellRunner(options: { env?: Record<string, string>; logger?: Logger } = {}): CommandRunner {
  const baseEnv = options.env ?? {};
  return {
    async run(cmd, args, opts) {
      options.logger?.debug({ [LogKeys.command]: `${cmd} ${args.join(" ")}` }, "Command");
      const result = await execCmd(cmd, args, {
        env: { ...baseEnv, ...(opts?.env ?? {}) },
        cwd: opts?.cwd,
        signal: opts?.signal,
        timeoutMs: opts?.timeoutMs,
      });
      return {
        ok: result.code === 0,
        exitCode: result.code,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    },
  };
}

/** Throw a RemoteCallError unless the command succeeded. */
export function expectOk(label: string, res: ShellResult): ShellResult {
  if (!res.ok) {
    throw new RemoteCallError(label, { exitCode: res.exitCode, stderr: res.stderr || res.stdout });
  }
  return res;
}

/** Parse JSON printed by a tool, reporting bad output as a failed remote call. */
export function parseJsonOutput(label: string, stdout: string): unknown {
  try {
    return JSON.parse(stdout);
  } catch (err) {
    throw new RemoteCallError(label, { message: "output is not valid JSON" }, { cause: err });
  }
}
