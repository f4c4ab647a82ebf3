/**
 * Error taxonomy for the cluster lifecycle.
 *
 * Step helpers throw the raw causes (RemoteCallError, PollTimeoutError, ...);
 * the sagas wrap them in a phase error that keeps the original as `cause`.
 */

export class RosaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Pre-flight option problems. Every violation is collected before throwing. */
export class ValidationError extends RosaError {
  readonly violations: string[];

  constructor(subject: string, violations: string[]) {
    super(`${subject}: ${violations.join("; ")}`);
    this.violations = violations;
  }
}

/** A wrapped tool or API returned non-success (or unparseable output). */
export class RemoteCallError extends RosaError {
  readonly command: string;
  readonly exitCode?: number;
  readonly stderr: string;

  constructor(command: string, detail: { exitCode?: number; stderr?: string; message?: string }, options?: { cause?: unknown }) {
    const stderr = detail.stderr?.trim() ?? "";
    const reason = detail.message ?? (detail.exitCode !== undefined ? `exit code ${detail.exitCode}` : "failed");
    super(`${command}: ${reason}${stderr ? `, stderr: ${stderr}` : ""}`, options);
    this.command = command;
    this.exitCode = detail.exitCode;
    this.stderr = stderr;
  }
}

/** A bounded wait ran out of time. The call that started the wait had succeeded. */
export class PollTimeoutError extends RosaError {
  readonly timeoutMs: number;

  constructor(description: string, timeoutMs: number) {
    super(`timed out after ${formatDuration(timeoutMs)} waiting for ${description}`);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends RosaError {
  constructor(description: string, options?: { cause?: unknown }) {
    super(`cancelled while ${description}`, options);
  }
}

/** Observed state that can never become valid by waiting (wrong role count, missing region, ...). */
export class InconsistentStateError extends RosaError {}

export class RegionError extends RosaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`region check failed: ${message}`, options);
  }
}

export class VersionError extends RosaError {
  constructor(action: string, message: string, options?: { cause?: unknown }) {
    super(`${action} versions failed: ${message}`, options);
  }
}

/** Base for errors tagged with the phase and action that failed. */
export class PhaseError extends RosaError {
  readonly action: string;

  constructor(action: string, subject: string, cause: unknown) {
    super(`${action} ${subject} failed: ${describeError(cause)}`, { cause });
    this.action = action;
  }
}

export class AccountRolesError extends PhaseError {
  constructor(action: string, cause: unknown) {
    super(action, "account roles", cause);
  }
}

export class OidcConfigError extends PhaseError {
  constructor(action: string, cause: unknown) {
    super(action, "oidc config", cause);
  }
}

export class OperatorRolesError extends PhaseError {
  constructor(action: string, cause: unknown) {
    super(action, "operator roles", cause);
  }
}

export class VpcError extends PhaseError {
  constructor(action: string, cause: unknown) {
    super(action, "vpc", cause);
  }
}

export class UpgradeError extends PhaseError {
  constructor(cause: unknown) {
    super("upgrade", "cluster", cause);
  }
}

export class ClusterError extends PhaseError {
  /** Set once the create call has committed, so callers can still find the cluster. */
  readonly clusterId?: string;

  constructor(action: "create" | "delete", cause: unknown, clusterId?: string) {
    super(action, "cluster", cause);
    this.clusterId = clusterId;
  }
}

export class ProviderError extends RosaError {
  constructor(cause: unknown) {
    super(`failed to construct rosa provider: ${describeError(cause)}`, { cause });
  }
}

/** Run one phase, re-throwing its failure wrapped by `wrap`. */
export async function withPhase<T>(run: () => Promise<T>, wrap: (cause: unknown) => Error): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw wrap(err);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return seconds === 0 ? `${minutes}m` : `${minutes}m ${seconds}s`;
}
