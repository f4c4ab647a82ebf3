import type { LifecycleContext } from "./context.js";
import {
  AccountRolesError,
  ClusterError,
  InconsistentStateError,
  OidcConfigError,
  OperatorRolesError,
  VpcError,
  withPhase,
} from "./errors.js";
import { LogKeys } from "./logger.js";
import type { DeleteClusterOptions } from "./options.js";
import { DEFAULT_ACCOUNT_ROLES_PREFIX, deleteAccountRoles } from "./steps/account-roles.js";
import { collectClusterLog } from "./steps/logs.js";
import { deleteOidcConfig, deleteOidcProvider } from "./steps/oidc-config.js";
import { deleteOperatorRoles } from "./steps/operator-roles.js";
import { deleteVpc } from "./steps/vpc.js";
import type { ClusterRecord } from "./tools/ocm.js";
import { rosaOk } from "./tools/rosa.js";
import { waitFor } from "./wait.js";

/**
 * Delete a cluster and, depending on its topology, the resources created
 * for it. Resolves only once everything is gone.
 */
export async function deleteCluster(ctx: LifecycleContext, options: DeleteClusterOptions): Promise<void> {
  const cluster = await withPhase(
    async () => {
      const found = await ctx.ocm.findCluster(options.clusterName, ctx.signal);
      if (!found) {
        throw new InconsistentStateError(
          `cluster "${options.clusterName}" not found in ocm environment "${ctx.ocmEnvironment}"`
        );
      }
      return found;
    },
    (err) => new ClusterError("delete", err)
  );

  try {
    await teardown(ctx, options, cluster);
  } catch (err) {
    throw err instanceof ClusterError ? err : new ClusterError("delete", err, cluster.id);
  }
}

async function teardown(ctx: LifecycleContext, options: DeleteClusterOptions, cluster: ClusterRecord): Promise<void> {
  const log = ctx.logger.child({ [LogKeys.clusterId]: cluster.id, [LogKeys.clusterName]: cluster.name });

  // Only hosted and private link clusters are installed with their own OIDC config
  const oidcConfigId = options.hostedCP || options.privateLink ? cluster.oidcConfigId : undefined;

  log.info("Deleting cluster");
  await rosaOk(ctx.rosa, ["delete", "cluster", "--cluster", cluster.id, "--yes"], { signal: ctx.signal });
  await collectClusterLog(ctx, cluster.name, "uninstall", options.artifactDir);
  await waitForClusterDeleted(ctx, cluster, options.uninstallTimeoutMs);

  if (options.sts || options.privateLink) {
    await withPhase(
      () => deleteOperatorRoles(ctx, cluster.id, cluster.operatorRolePrefix),
      (err) => new OperatorRolesError("delete", err)
    );
    await withPhase(
      () => deleteOidcProvider(ctx, cluster.id, oidcConfigId),
      (err) => new OidcConfigError("delete", err)
    );
  }

  if (options.hostedCP || options.privateLink) {
    if (options.deleteOidcConfig) {
      if (oidcConfigId) {
        await withPhase(
          () => deleteOidcConfig(ctx, oidcConfigId),
          (err) => new OidcConfigError("delete", err)
        );
      } else {
        log.warn("Cluster record carries no OIDC config id, skipping OIDC config deletion");
      }
    }

    if (options.deleteHostedVPC) {
      await withPhase(
        () => deleteVpc(ctx, { clusterName: cluster.name, region: ctx.region, workingDir: options.workingDir }),
        (err) => new VpcError("delete", err)
      );
    }
  }

  // Roles under the shared default prefix outlive any single cluster
  if (options.sts && !(cluster.roleArn ?? "").includes(DEFAULT_ACCOUNT_ROLES_PREFIX)) {
    await withPhase(
      () => deleteAccountRoles(ctx, cluster.name),
      (err) => new AccountRolesError("delete", err)
    );
  }

  log.info("Cluster deleted");
}

/** Poll OCM until the cluster is no longer listed. Lookup failures end the wait. */
export async function waitForClusterDeleted(ctx: LifecycleContext, cluster: ClusterRecord, timeoutMs: number): Promise<void> {
  const log = ctx.logger.child({ [LogKeys.clusterId]: cluster.id, [LogKeys.clusterName]: cluster.name });
  let lastState = cluster.state;

  log.info({ [LogKeys.timeout]: timeoutMs }, "Waiting for cluster to be deleted");
  await waitFor(
    async (signal) => {
      const current = await ctx.ocm.findCluster(cluster.id, signal);
      if (!current) return true;
      if (current.state !== lastState) {
        log.info({ [LogKeys.clusterState]: current.state }, "Cluster state");
        lastState = current.state;
      }
      return false;
    },
    {
      timeoutMs,
      intervalMs: ctx.pollIntervalMs,
      signal: ctx.signal,
      description: `cluster "${cluster.name}" to be deleted`,
    }
  );
}
