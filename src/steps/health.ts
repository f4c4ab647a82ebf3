import type { LifecycleContext } from "../context.js";
import { LogKeys } from "../logger.js";
import { writeKubeconfig } from "../tools/ocm.js";

export type ClusterHealthRequest = {
  clusterId: string;
  clusterName: string;
  hostedCP: boolean;
  expectedComputeNodes: number;
  /** Where the kubeconfig is written. */
  kubeconfigDir: string;
  artifactDir: string;
  timeoutMs: number;
};

export async function checkClusterHealth(ctx: LifecycleContext, req: ClusterHealthRequest): Promise<void> {
  const kubeconfig = await writeKubeconfig(ctx.ocm, req.clusterId, req.kubeconfigDir, ctx.signal);
  ctx.logger.info({ [LogKeys.clusterId]: req.clusterId, kubeconfig }, "Kubeconfig written");

  await ctx.health.clusterHealthy({
    kubeconfig,
    hostedCP: req.hostedCP,
    expectedComputeNodes: req.expectedComputeNodes,
    artifactDir: req.artifactDir,
    clusterName: req.clusterName,
    timeoutMs: req.timeoutMs,
    signal: ctx.signal,
  });
  ctx.logger.info({ [LogKeys.clusterId]: req.clusterId }, "Cluster is healthy");
}
