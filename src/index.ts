export { loadConfig, OCM_ENVIRONMENTS, RANDOM_REGION } from "./config.js";
export type { OcmEnvironmentName, RosaConfig } from "./config.js";
export { newProvider, loginArgs } from "./provider.js";
export type { Provider, ProviderDeps } from "./provider.js";
export { createCluster, waitForClusterInstalled } from "./create.js";
export { deleteCluster, waitForClusterDeleted } from "./delete.js";
export { buildCreateClusterArgs } from "./cluster-args.js";
export { CreatedResourcesTracker } from "./compensation.js";
export type { LifecycleContext, StepContext, VpcContext } from "./context.js";
export * from "./errors.js";
export { createLogger, silentLogger, LogKeys } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { resolveCreateOptions, resolveDeleteOptions } from "./options.js";
export type { CreateClusterOptions, DeleteClusterOptions, ProvisionedResources } from "./options.js";
export type { CreateClusterInput, DeleteClusterInput, RegionsInput, UpgradeGateInput, VersionsInput } from "./schema.js";
export { waitFor, sleep, DEFAULT_POLL_INTERVAL_MS } from "./wait.js";
export type { ConditionCheck, WaitOptions } from "./wait.js";
export * from "./steps/account-roles.js";
export * from "./steps/oidc-config.js";
export * from "./steps/operator-roles.js";
export * from "./steps/regions.js";
export * from "./steps/versions.js";
export * from "./steps/vpc.js";
export type { HealthChecker, HealthCheckRequest } from "./tools/kubectl.js";
export type { ClusterRecord, OcmClient, OidcConfig } from "./tools/ocm.js";
export type { Region, Version } from "./tools/rosa.js";
export type { CommandRunner, ShellResult } from "./tools/shell.js";
export type { InfraExecutor, InfraExecutorFactory } from "./tools/terraform.js";
export { createKubectlHealthChecker } from "./tools/kubectl.js";
export { createOcmClient, writeKubeconfig } from "./tools/ocm.js";
export { createShellRunner } from "./tools/shell.js";
export { createTerraform } from "./tools/terraform.js";
