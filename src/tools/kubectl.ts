import { writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { InconsistentStateError } from "../errors.js";
import type { Logger } from "../logger.js";
import { LogKeys } from "../logger.js";
import { waitFor } from "../wait.js";
import { CommandRunner, ShellResult } from "./shell.js";

export type HealthCheckRequest = {
  kubeconfig: string;
  hostedCP: boolean;
  /** Nodes that must be Ready before a hosted cluster counts as healthy. */
  expectedComputeNodes: number;
  artifactDir: string;
  clusterName: string;
  timeoutMs: number;
  signal?: AbortSignal;
};

export interface HealthChecker {
  clusterHealthy(req: HealthCheckRequest): Promise<void>;
}

export const READY_JOB_NAME = "osd-cluster-ready";
export const READY_JOB_NAMESPACE = "openshift-monitoring";

const NodeListSchema = z.object({
  items: z.array(
    z.object({
      metadata: z.object({ name: z.string() }),
      status: z
        .object({
          conditions: z.array(z.object({ type: z.string(), status: z.string() })).optional().default([]),
        })
        .optional()
        .default({}),
    })
  ),
});

const JobSchema = z.object({
  status: z
    .object({
      succeeded: z.number().optional(),
      failed: z.number().optional(),
      conditions: z.array(z.object({ type: z.string(), status: z.string() })).optional().default([]),
    })
    .optional()
    .default({}),
});

export function kubectl(runner: CommandRunner, kubeconfig: string, args: string[], signal?: AbortSignal): Promise<ShellResult> {
  return runner.run("kubectl", args, { env: { KUBECONFIG: kubeconfig }, signal });
}

/** Count nodes and how many of them report the Ready condition. */
export function summarizeNodes(raw: unknown): { total: number; ready: number } {
  const parsed = NodeListSchema.safeParse(raw);
  if (!parsed.success) return { total: 0, ready: 0 };
  const nodes = parsed.data.items;
  const ready = nodes.filter((n) => n.status.conditions.some((c) => c.type === "Ready" && c.status === "True")).length;
  return { total: nodes.length, ready };
}

/**
 * Health checks over kubectl. A hosted cluster is healthy once every node is
 * Ready; a classic cluster once the readiness job has completed.
 */
export function createKubectlHealthChecker(options: {
  runner: CommandRunner;
  logger: Logger;
  intervalMs?: number;
}): HealthChecker {
  const { runner, logger } = options;

  const nodesReady = async (req: HealthCheckRequest, signal?: AbortSignal): Promise<boolean> => {
    const res = await kubectl(runner, req.kubeconfig, ["get", "nodes", "--output", "json"], signal);
    // API server is often unreachable for a while right after install
    if (!res.ok) {
      logger.debug({ [LogKeys.clusterName]: req.clusterName, stderr: res.stderr }, "Node list not available yet");
      return false;
    }
    const { total, ready } = summarizeNodes(safeJson(res.stdout));
    logger.info({ [LogKeys.clusterName]: req.clusterName, total, ready }, "Nodes ready");
    return total > 0 && total >= req.expectedComputeNodes && ready === total;
  };

  const jobComplete = async (req: HealthCheckRequest, signal?: AbortSignal): Promise<boolean> => {
    const res = await kubectl(
      runner,
      req.kubeconfig,
      ["get", "job", READY_JOB_NAME, "--namespace", READY_JOB_NAMESPACE, "--output", "json"],
      signal
    );
    if (!res.ok) {
      logger.debug({ [LogKeys.clusterName]: req.clusterName, stderr: res.stderr }, "Readiness job not available yet");
      return false;
    }
    const parsed = JobSchema.safeParse(safeJson(res.stdout));
    if (!parsed.success) return false;
    const status = parsed.data.status;
    if (status.conditions.some((c) => c.type === "Failed" && c.status === "True")) {
      throw new InconsistentStateError(`job ${READY_JOB_NAMESPACE}/${READY_JOB_NAME} failed`);
    }
    return (status.succeeded ?? 0) > 0;
  };

  const saveJobLog = async (req: HealthCheckRequest) => {
    const res = await kubectl(runner, req.kubeconfig, [
      "logs",
      "--namespace",
      READY_JOB_NAMESPACE,
      "--selector",
      `job-name=${READY_JOB_NAME}`,
      "--tail=-1",
    ]);
    if (!res.ok) {
      logger.warn({ [LogKeys.clusterName]: req.clusterName, stderr: res.stderr }, "Failed to fetch readiness job log");
      return;
    }
    const file = path.join(req.artifactDir, `${READY_JOB_NAME}.log`);
    try {
      await writeFile(file, res.stdout + "\n", "utf8");
      logger.info({ [LogKeys.clusterName]: req.clusterName, file }, "Readiness job log saved");
    } catch (err) {
      logger.warn({ [LogKeys.clusterName]: req.clusterName, err }, "Failed to write readiness job log");
    }
  };

  return {
    async clusterHealthy(req) {
      logger.info({ [LogKeys.clusterName]: req.clusterName, hostedCP: req.hostedCP }, "Waiting for cluster to be healthy");

      if (req.hostedCP) {
        await waitFor((signal) => nodesReady(req, signal), {
          timeoutMs: req.timeoutMs,
          intervalMs: options.intervalMs,
          signal: req.signal,
          description: `cluster "${req.clusterName}" nodes to be ready`,
        });
        return;
      }

      try {
        await waitFor((signal) => jobComplete(req, signal), {
          timeoutMs: req.timeoutMs,
          intervalMs: options.intervalMs,
          signal: req.signal,
          description: `job ${READY_JOB_NAMESPACE}/${READY_JOB_NAME} to complete`,
        });
      } catch (err) {
        if (!req.signal?.aborted) await saveJobLog(req);
        throw err;
      }
    },
  };
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
