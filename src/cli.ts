import type { CreateClusterInput, DeleteClusterInput, RegionsInput, UpgradeGateInput, VersionsInput } from "./schema.js";

export type CliArgs = Record<string, string | undefined>;

/** `--key value` pairs; a flag with no value reads as "true". Positional words are skipped. */
export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const next = argv[i + 1];
    const val = next !== undefined && !next.startsWith("--") ? argv[++i] : "true";
    out[a.slice(2)] = val;
  }
  return out;
}

const CREATE_FLAGS = [
  "cluster-name",
  "version",
  "channel-group",
  "hosted-cp",
  "multi-az",
  "sts",
  "private-link",
  "mint-mode",
  "fips",
  "enable-autoscaling",
  "etcd-encryption",
  "use-default-account-roles-prefix",
  "skip-health-check",
  "compute-machine-type",
  "replicas",
  "min-replicas",
  "max-replicas",
  "machine-cidr",
  "pod-cidr",
  "service-cidr",
  "host-prefix",
  "network-type",
  "http-proxy",
  "https-proxy",
  "no-proxy",
  "additional-trust-bundle-file",
  "properties",
  "install-timeout",
  "health-check-timeout",
  "expiration",
  "artifact-dir",
  "working-dir",
  "oidc-config-id",
  "subnet-ids",
  "billing-account",
];

const DELETE_FLAGS = [
  "cluster-name",
  "hosted-cp",
  "sts",
  "private-link",
  "mint-mode",
  "delete-hosted-vpc",
  "delete-oidc-config",
  "uninstall-timeout",
  "artifact-dir",
  "working-dir",
];

export const COMMAND_FLAGS: Record<string, string[]> = {
  create: CREATE_FLAGS,
  delete: DELETE_FLAGS,
  versions: ["channel-group", "hosted-cp", "constraints"],
  regions: ["hosted-cp", "multi-az"],
  "upgrade-gate": ["cluster-id", "current-version", "target-version"],
};

/** Flags the command does not know. "log-level" is accepted everywhere. */
export function unknownFlags(command: string, args: CliArgs): string[] {
  const known = new Set([...(COMMAND_FLAGS[command] ?? []), "log-level"]);
  return Object.keys(args)
    .filter((k) => !known.has(k))
    .map((k) => `--${k}`);
}

function minutes(v: string | undefined): number | undefined {
  return v === undefined ? undefined : Math.round(Number(v) * 60 * 1000);
}

/** "a:1,b:2" -> { a: "1", b: "2" }. Values may themselves contain ':'. */
export function parseProperties(v: string | undefined): Record<string, string> | undefined {
  if (v === undefined) return undefined;
  const out: Record<string, string> = {};
  for (const pair of v.split(",")) {
    const idx = pair.indexOf(":");
    if (idx <= 0) continue;
    out[pair.slice(0, idx).trim()] = pair.slice(idx + 1).trim();
  }
  return out;
}

export function toCreateInput(args: CliArgs): CreateClusterInput {
  return {
    clusterName: args["cluster-name"],
    version: args["version"],
    channelGroup: args["channel-group"],
    hostedCP: args["hosted-cp"],
    multiAZ: args["multi-az"],
    sts: args["sts"],
    privateLink: args["private-link"],
    mintMode: args["mint-mode"],
    fips: args["fips"],
    enableAutoscaling: args["enable-autoscaling"],
    etcdEncryption: args["etcd-encryption"],
    useDefaultAccountRolesPrefix: args["use-default-account-roles-prefix"],
    skipHealthCheck: args["skip-health-check"],
    computeMachineType: args["compute-machine-type"],
    replicas: args["replicas"],
    minReplicas: args["min-replicas"],
    maxReplicas: args["max-replicas"],
    machineCidr: args["machine-cidr"],
    podCidr: args["pod-cidr"],
    serviceCidr: args["service-cidr"],
    hostPrefix: args["host-prefix"],
    networkType: args["network-type"],
    httpProxy: args["http-proxy"],
    httpsProxy: args["https-proxy"],
    noProxy: args["no-proxy"],
    additionalTrustBundleFile: args["additional-trust-bundle-file"],
    properties: parseProperties(args["properties"]),
    installTimeoutMs: minutes(args["install-timeout"]),
    healthCheckTimeoutMs: minutes(args["health-check-timeout"]),
    expirationMs: minutes(args["expiration"]),
    artifactDir: args["artifact-dir"],
    workingDir: args["working-dir"],
    oidcConfigId: args["oidc-config-id"],
    subnetIds: args["subnet-ids"],
    billingAccountId: args["billing-account"],
  };
}

export function toDeleteInput(args: CliArgs): DeleteClusterInput {
  return {
    clusterName: args["cluster-name"] ?? "",
    hostedCP: args["hosted-cp"],
    sts: args["sts"],
    privateLink: args["private-link"],
    mintMode: args["mint-mode"],
    deleteHostedVPC: args["delete-hosted-vpc"],
    deleteOidcConfig: args["delete-oidc-config"],
    uninstallTimeoutMs: minutes(args["uninstall-timeout"]),
    artifactDir: args["artifact-dir"],
    workingDir: args["working-dir"],
  };
}

export function toVersionsInput(args: CliArgs): VersionsInput {
  return {
    channelGroup: args["channel-group"],
    hostedCP: args["hosted-cp"],
    constraints: args["constraints"]
      ?.split(",")
      .map((c) => c.trim())
      .filter(Boolean),
  };
}

export function toRegionsInput(args: CliArgs): RegionsInput {
  return { hostedCP: args["hosted-cp"], multiAZ: args["multi-az"] };
}

export function toUpgradeGateInput(args: CliArgs): UpgradeGateInput {
  return {
    clusterId: args["cluster-id"] ?? "",
    currentVersion: args["current-version"] ?? "",
    targetVersion: args["target-version"] ?? "",
  };
}
