import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

// Structured keys shared by every log line that mentions the resource.
export const LogKeys = {
  awsRegion: "awsRegion",
  channelGroup: "channelGroup",
  clusterId: "clusterId",
  clusterLog: "clusterLog",
  clusterName: "clusterName",
  clusterState: "clusterState",
  ocmEnvironment: "ocmEnvironment",
  oidcConfigId: "oidcConfigId",
  prefix: "prefix",
  command: "command",
  timeout: "timeout",
  workingDir: "terraformWorkingDir",
  version: "version",
} as const;

/**
 * Create the root logger. Lines go to stderr so that stdout stays reserved for
 * the JSON results printed by the CLI.
 */
export function createLogger(options: { level?: LogLevel; name?: string } = {}): Logger {
  return pino(
    {
      name: options.name ?? "rosa-cluster",
      level: options.level ?? "info",
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/** Logger that drops everything. Used by tests and library callers that bring no logger. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
