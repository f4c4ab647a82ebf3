import os from "node:os";
import { buildCreateClusterArgs } from "./cluster-args.js";
import { CreatedResourcesTracker } from "./compensation.js";
import type { LifecycleContext } from "./context.js";
import {
  AccountRolesError,
  CancelledError,
  ClusterError,
  InconsistentStateError,
  OidcConfigError,
  ValidationError,
  VpcError,
  withPhase,
} from "./errors.js";
import { LogKeys } from "./logger.js";
import { CreateClusterOptions, ProvisionedResources, createCallViolations, preflightViolations } from "./options.js";
import { accountRolesPrefix, deleteAccountRoles, resolveAccountRoles } from "./steps/account-roles.js";
import { checkClusterHealth } from "./steps/health.js";
import { collectClusterLog } from "./steps/logs.js";
import { deleteOidcConfig, resolveOidcConfig } from "./steps/oidc-config.js";
import { regionCheck } from "./steps/regions.js";
import { NIGHTLY_CHANNEL_GROUP, majorMinor, waitForNightlyVersion } from "./steps/versions.js";
import { createVpc, deleteVpc, subnetIdsOf } from "./steps/vpc.js";
import { CreatedClusterSchema, DescribedClusterSchema, rosaJson } from "./tools/rosa.js";
import { waitFor } from "./wait.js";

export const CLUSTER_READY_STATE = "ready";
export const CLUSTER_ERROR_STATE = "error";

/**
 * Create a cluster and wait until it is installed (and healthy, unless
 * skipped). Returns the cluster id.
 *
 * Resources this attempt creates before the create call commits are removed
 * again, newest first, when a later step fails. After the commit the cluster
 * owns them: install and health failures carry the cluster id instead.
 */
export async function createCluster(ctx: LifecycleContext, options: CreateClusterOptions): Promise<string> {
  const log = ctx.logger.child({ [LogKeys.clusterName]: options.clusterName });

  const preflight = preflightViolations(options, ctx.restricted);
  if (preflight.length > 0) {
    throw new ClusterError("create", new ValidationError("create cluster options", preflight));
  }

  if (options.channelGroup === NIGHTLY_CHANNEL_GROUP) {
    await withPhase(
      () => waitForNightlyVersion(ctx, options.version, options.hostedCP),
      (err) => new ClusterError("create", err)
    );
  }

  await withPhase(
    () => regionCheck(ctx, ctx.region, options.hostedCP, options.multiAZ),
    (err) => new ClusterError("create", err)
  );

  const tracker = new CreatedResourcesTracker();
  let clusterId: string;
  try {
    const resources = await provision(ctx, options, tracker);
    clusterId = await requestCluster(ctx, options, resources);
  } catch (err) {
    await tracker.compensate(log);
    throw new ClusterError("create", err);
  }

  log.info({ [LogKeys.clusterId]: clusterId, [LogKeys.ocmEnvironment]: ctx.ocmEnvironment }, "Cluster creation initiated");

  try {
    await waitForClusterInstalled(ctx, clusterId, options.clusterName, options.installTimeoutMs);
  } catch (err) {
    if (!(err instanceof CancelledError)) {
      await collectClusterLog(ctx, options.clusterName, "install", options.artifactDir);
    }
    throw new ClusterError("create", err, clusterId);
  }

  if (!options.skipHealthCheck) {
    await withPhase(
      () =>
        checkClusterHealth(ctx, {
          clusterId,
          clusterName: options.clusterName,
          hostedCP: options.hostedCP,
          expectedComputeNodes: options.minReplicas > 0 ? options.minReplicas : options.replicas,
          kubeconfigDir: os.tmpdir(),
          artifactDir: options.artifactDir,
          timeoutMs: options.healthCheckTimeoutMs,
        }),
      (err) => new ClusterError("create", err, clusterId)
    );
  }

  log.info({ [LogKeys.clusterId]: clusterId }, "Cluster is installed");
  return clusterId;
}

async function provision(
  ctx: LifecycleContext,
  options: CreateClusterOptions,
  tracker: CreatedResourcesTracker
): Promise<ProvisionedResources> {
  const resources: ProvisionedResources = {
    oidcConfigId: options.oidcConfigId,
    subnetIds: options.subnetIds,
    billingAccountId: options.billingAccountId,
  };
  // Cleanup has to run even when the caller's signal aborted the attempt
  const cleanupCtx: LifecycleContext = { ...ctx, signal: undefined };

  if (options.hostedCP || options.sts) {
    const roleVersion = majorMinor(options.version);
    const prefix = accountRolesPrefix(options.clusterName, roleVersion, options.useDefaultAccountRolesPrefix);

    const { roles, created } = await withPhase(
      () =>
        resolveAccountRoles(ctx, {
          prefix,
          version: roleVersion,
          channelGroup: options.channelGroup,
          hostedCP: options.hostedCP,
        }),
      (err) => new AccountRolesError("create", err)
    );
    resources.accountRoles = roles;
    // Roles under the shared default prefix belong to every cluster of that version
    if (created && !options.useDefaultAccountRolesPrefix) {
      tracker.track("account-roles", () => deleteAccountRoles(cleanupCtx, prefix));
    }

    if (!resources.oidcConfigId) {
      const oidc = await withPhase(
        () => resolveOidcConfig(ctx, options.clusterName, roles.installer),
        (err) => new OidcConfigError("create", err)
      );
      resources.oidcConfigId = oidc.id;
      if (oidc.created) {
        tracker.track("oidc-config", () => deleteOidcConfig(cleanupCtx, oidc.id));
      }
    }
  }

  if ((options.hostedCP || options.privateLink) && !resources.subnetIds) {
    const vpc = { clusterName: options.clusterName, region: ctx.region, workingDir: options.workingDir };
    // Tracked up front: a failed apply may leave part of the stack
    tracker.track("network-stack", () => deleteVpc(cleanupCtx, vpc));
    const stack = await withPhase(
      () => createVpc(ctx, { ...vpc, hostedCP: options.hostedCP, privateLink: options.privateLink }),
      (err) => new VpcError("create", err)
    );
    resources.subnetIds = subnetIdsOf(stack);
  }

  return resources;
}

async function requestCluster(
  ctx: LifecycleContext,
  options: CreateClusterOptions,
  resources: ProvisionedResources
): Promise<string> {
  const violations = createCallViolations(options, resources, ctx.restricted);
  if (violations.length > 0) {
    throw new ValidationError("create cluster options", violations);
  }

  const args = buildCreateClusterArgs({
    options,
    resources,
    region: ctx.region,
    ocmEnvironment: ctx.ocmEnvironment,
    awsAccountId: ctx.awsAccountId,
    now: new Date(),
  });
  const created = await rosaJson(ctx.rosa, args, CreatedClusterSchema, { signal: ctx.signal });
  return created.id;
}

/** Poll `rosa describe cluster` until the cluster reports ready. An error state ends the wait. */
export async function waitForClusterInstalled(
  ctx: LifecycleContext,
  clusterId: string,
  clusterName: string,
  timeoutMs: number
): Promise<void> {
  const log = ctx.logger.child({ [LogKeys.clusterId]: clusterId, [LogKeys.clusterName]: clusterName });
  let lastState = "";

  log.info({ [LogKeys.timeout]: timeoutMs }, "Waiting for cluster to be installed");
  await waitFor(
    async (signal) => {
      const cluster = await rosaJson(
        ctx.rosa,
        ["describe", "cluster", "--cluster", clusterId, "--output", "json"],
        DescribedClusterSchema,
        { signal }
      );
      const state = cluster.status.state;
      if (state !== lastState) {
        log.info({ [LogKeys.clusterState]: state }, "Cluster state");
        lastState = state;
      }
      if (state === CLUSTER_ERROR_STATE) {
        throw new InconsistentStateError(`cluster "${clusterName}" entered state "${state}"`);
      }
      return state === CLUSTER_READY_STATE;
    },
    {
      timeoutMs,
      intervalMs: ctx.pollIntervalMs,
      signal: ctx.signal,
      description: `cluster "${clusterName}" to be installed`,
    }
  );
}
