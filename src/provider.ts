import os from "node:os";
import path from "node:path";
import { RANDOM_REGION, RosaConfig } from "./config.js";
import type { LifecycleContext, StepContext } from "./context.js";
import { createCluster } from "./create.js";
import { deleteCluster } from "./delete.js";
import { ProviderError, UpgradeError, ValidationError, withPhase } from "./errors.js";
import type { Logger } from "./logger.js";
import { LogKeys } from "./logger.js";
import { parseInput, resolveCreateOptions, resolveDeleteOptions } from "./options.js";
import {
  CreateClusterInput,
  DeleteClusterInput,
  RegionsInput,
  RegionsInputSchema,
  UpgradeGateInput,
  UpgradeGateInputSchema,
  VersionsInput,
  VersionsInputSchema,
} from "./schema.js";
import { listRegions, selectRandomRegion } from "./steps/regions.js";
import { GateAgreementOutcome, addGateAgreement, listVersions } from "./steps/versions.js";
import { checkAwsCredentials, credentialsAsEnv, isRestrictedPartition } from "./tools/credentials.js";
import { HealthChecker, createKubectlHealthChecker } from "./tools/kubectl.js";
import { OcmClient, createOcmClient, writeKubeconfig } from "./tools/ocm.js";
import { Region, RosaCli, Version, WhoamiSchema, rosaJson, rosaOk } from "./tools/rosa.js";
import { CommandRunner, createShellRunner } from "./tools/shell.js";
import { InfraExecutorFactory, createTerraform } from "./tools/terraform.js";

// Region used for the calls that pick a random region
const BOOTSTRAP_REGION = "us-east-1";

export type ProviderDeps = {
  logger: Logger;
  runner?: CommandRunner;
  ocm?: OcmClient;
  health?: HealthChecker;
  infra?: InfraExecutorFactory;
  /** Where `rosa login` keeps its state. Defaults to the OS temp directory. */
  ocmConfigDir?: string;
  signal?: AbortSignal;
};

export type Provider = {
  readonly region: string;
  readonly awsAccountId: string;
  readonly ocmEnvironment: string;
  readonly restricted: boolean;
  createCluster(input: CreateClusterInput, signal?: AbortSignal): Promise<string>;
  deleteCluster(input: DeleteClusterInput, signal?: AbortSignal): Promise<void>;
  versions(input?: VersionsInput, signal?: AbortSignal): Promise<Version[]>;
  regions(input?: RegionsInput, signal?: AbortSignal): Promise<Region[]>;
  upgradeGate(input: UpgradeGateInput, signal?: AbortSignal): Promise<GateAgreementOutcome>;
  kubeconfigFile(clusterId: string, directory: string, signal?: AbortSignal): Promise<string>;
};

/**
 * Log in with rosa, look up the AWS account and resolve the region, then
 * hand out the lifecycle operations bound to that session.
 */
export async function newProvider(config: RosaConfig, deps: ProviderDeps): Promise<Provider> {
  const { logger } = deps;
  return withPhase(
    async () => {
      const problems = checkAwsCredentials(config.aws);
      if (problems.length > 0) {
        throw new ValidationError("aws credentials", problems);
      }

      const randomRegion = config.aws.region === RANDOM_REGION;
      const restricted = isRestrictedPartition(config.aws.region);
      const credentialEnv = credentialsAsEnv(config.aws);
      const runner = deps.runner ?? createShellRunner({ env: credentialEnv, logger });
      const ocm =
        deps.ocm ??
        createOcmClient({ apiUrl: config.ocm.apiUrl, tokenUrl: config.ocm.tokenUrl, credentials: config.ocm.credentials });
      const ocmConfig = path.join(deps.ocmConfigDir ?? os.tmpdir(), "ocm.json");

      const cliFor = (region: string): RosaCli => ({
        binary: config.rosaBinary,
        runner,
        env: { OCM_CONFIG: ocmConfig, AWS_REGION: region },
      });

      let region = randomRegion ? BOOTSTRAP_REGION : config.aws.region;
      const bootstrap = cliFor(region);

      const version = await rosaOk(bootstrap, ["version"], { signal: deps.signal });
      logger.info({ [LogKeys.version]: version.stdout.split("\n")[0] }, "ROSA version");

      await rosaOk(bootstrap, loginArgs(config, region), { signal: deps.signal });
      logger.info({ [LogKeys.ocmEnvironment]: config.ocm.environment }, "Logged in to OCM");

      const whoami = await rosaJson(bootstrap, ["whoami", "--output", "json"], WhoamiSchema, { signal: deps.signal });

      const stepContext = (cli: RosaCli, signal?: AbortSignal): StepContext => ({
        rosa: cli,
        ocm,
        logger,
        restricted,
        pollIntervalMs: config.pollIntervalMs,
        signal,
      });

      if (randomRegion) {
        region = await selectRandomRegion(stepContext(bootstrap, deps.signal));
      }

      const rosa = cliFor(region);
      const awsEnv = { ...credentialEnv, AWS_REGION: region };
      const health = deps.health ?? createKubectlHealthChecker({ runner, logger, intervalMs: config.pollIntervalMs });
      const infra: InfraExecutorFactory =
        deps.infra ??
        ((workingDir) => createTerraform({ runner, workingDir, env: awsEnv, binary: config.terraformBinary }));

      const lifecycle = (signal?: AbortSignal): LifecycleContext => ({
        ...stepContext(rosa, signal),
        infra,
        health,
        ocmEnvironment: config.ocm.environment,
        awsAccountId: whoami.awsAccountId,
        region,
      });

      logger.info({ [LogKeys.awsRegion]: region, awsAccountId: whoami.awsAccountId }, "ROSA provider ready");

      return {
        region,
        awsAccountId: whoami.awsAccountId,
        ocmEnvironment: config.ocm.environment,
        restricted,

        async createCluster(input, signal) {
          return createCluster(lifecycle(signal), resolveCreateOptions(input));
        },

        async deleteCluster(input, signal) {
          return deleteCluster(lifecycle(signal), resolveDeleteOptions(input));
        },

        async versions(input = {}, signal) {
          const parsed = parseInput("versions options", VersionsInputSchema, input);
          return listVersions(stepContext(rosa, signal), parsed.channelGroup, parsed.hostedCP, parsed.constraints);
        },

        async regions(input = {}, signal) {
          const parsed = parseInput("regions options", RegionsInputSchema, input);
          return listRegions(stepContext(rosa, signal), parsed);
        },

        upgradeGate(input, signal) {
          return withPhase(
            async () => {
              const parsed = parseInput("upgrade options", UpgradeGateInputSchema, input);
              return addGateAgreement(stepContext(rosa, signal), parsed.clusterId, parsed.currentVersion, parsed.targetVersion);
            },
            (err) => new UpgradeError(err)
          );
        },

        async kubeconfigFile(clusterId, directory, signal) {
          return writeKubeconfig(ocm, clusterId, directory, signal);
        },
      } satisfies Provider;
    },
    (err) => new ProviderError(err)
  );
}

/** `rosa login` arguments for the configured OCM environment and credentials. */
export function loginArgs(config: RosaConfig, region: string): string[] {
  const args = ["login"];
  const creds = config.ocm.credentials;
  let env: string = config.ocm.apiUrl;

  if (creds.kind === "client-credentials") {
    args.push("--client-id", creds.clientId, "--client-secret", creds.clientSecret);
    // The govcloud build of rosa only knows the integration environment by name
    if (config.ocm.environment === "fedramp-integration") {
      args.push("--govcloud");
      env = "integration";
    }
  } else {
    args.push("--token", creds.token);
  }

  args.push("--env", env, "--region", region);
  return args;
}
