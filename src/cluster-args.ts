import type { CreateClusterOptions, ProvisionedResources } from "./options.js";

/** OCM environment where clusters cannot carry an expiration time. */
export const PRODUCTION_OCM_ENVIRONMENT = "production";

// Private link clusters are always placed in the template's VPC range
const PRIVATE_LINK_MACHINE_CIDR = "10.0.0.0/16";

export type ClusterArgsInput = {
  options: CreateClusterOptions;
  resources: ProvisionedResources;
  region: string;
  ocmEnvironment: string;
  /** Fallback billing account for hosted clusters: the logged-in AWS account. */
  awsAccountId: string;
  now: Date;
};

type ClusterArg = {
  flag: string;
  when: (i: ClusterArgsInput) => boolean;
  /** Values following the flag; each one repeats it. Empty means a bare flag. */
  render?: (i: ClusterArgsInput) => string[];
};

const always = () => true;
const isSet = (value: string | undefined) => value !== undefined && value !== "";
const value = (pick: (i: ClusterArgsInput) => string | number | undefined) => (i: ClusterArgsInput) => [String(pick(i) ?? "")];
const classicSts = (i: ClusterArgsInput) => !i.options.hostedCP && i.options.sts;
const hasSubnets = (i: ClusterArgsInput) => isSet(i.resources.subnetIds);

const CLUSTER_ARGS: ClusterArg[] = [
  { flag: "--output", when: always, render: () => ["json"] },
  { flag: "--cluster-name", when: always, render: value((i) => i.options.clusterName) },
  { flag: "--channel-group", when: always, render: value((i) => i.options.channelGroup) },
  { flag: "--compute-machine-type", when: always, render: value((i) => i.options.computeMachineType) },
  {
    flag: "--machine-cidr",
    when: always,
    render: value((i) => (i.options.privateLink ? PRIVATE_LINK_MACHINE_CIDR : i.options.machineCidr)),
  },
  { flag: "--region", when: always, render: value((i) => i.region) },
  { flag: "--version", when: always, render: value((i) => i.options.version) },
  { flag: "--host-prefix", when: (i) => i.options.hostPrefix > 0, render: value((i) => i.options.hostPrefix) },
  { flag: "--oidc-config-id", when: (i) => isSet(i.resources.oidcConfigId), render: value((i) => i.resources.oidcConfigId) },
  { flag: "--yes", when: always },

  { flag: "--role-arn", when: classicSts, render: value((i) => i.resources.accountRoles?.installer) },
  { flag: "--controlplane-iam-role", when: classicSts, render: value((i) => i.resources.accountRoles?.controlPlane) },
  { flag: "--support-role-arn", when: classicSts, render: value((i) => i.resources.accountRoles?.support) },
  { flag: "--worker-iam-role", when: classicSts, render: value((i) => i.resources.accountRoles?.worker) },

  { flag: "--pod-cidr", when: (i) => isSet(i.options.podCidr), render: value((i) => i.options.podCidr) },
  { flag: "--service-cidr", when: (i) => isSet(i.options.serviceCidr), render: value((i) => i.options.serviceCidr) },
  {
    flag: "--properties",
    when: (i) => Object.keys(i.options.properties).length > 0,
    render: (i) => Object.entries(i.options.properties).map(([k, v]) => `${k}:${v}`),
  },
  { flag: "--mode", when: (i) => i.options.hostedCP || i.options.sts, render: () => ["auto"] },

  { flag: "--hosted-cp", when: (i) => i.options.hostedCP },
  { flag: "--role-arn", when: (i) => i.options.hostedCP, render: value((i) => i.resources.accountRoles?.hcpInstaller) },
  { flag: "--support-role-arn", when: (i) => i.options.hostedCP, render: value((i) => i.resources.accountRoles?.hcpSupport) },
  { flag: "--worker-iam-role", when: (i) => i.options.hostedCP, render: value((i) => i.resources.accountRoles?.hcpWorker) },
  {
    flag: "--billing-account",
    when: (i) => i.options.hostedCP,
    render: value((i) => i.resources.billingAccountId || i.awsAccountId),
  },

  { flag: "--subnet-ids", when: hasSubnets, render: value((i) => i.resources.subnetIds) },
  { flag: "--sts", when: (i) => i.options.sts },
  { flag: "--mint-mode", when: (i) => i.options.mintMode },
  { flag: "--private-link", when: (i) => i.options.privateLink },
  { flag: "--fips", when: (i) => i.options.fips },
  {
    flag: "--network-type",
    when: (i) => isSet(i.options.networkType) && i.options.networkType !== "OVNKubernetes",
    render: value((i) => i.options.networkType),
  },
  { flag: "--multi-az", when: (i) => i.options.multiAZ },
  { flag: "--enable-autoscaling", when: (i) => i.options.enableAutoscaling },
  { flag: "--etcd-encryption", when: (i) => i.options.etcdEncryption },
  { flag: "--min-replicas", when: (i) => i.options.minReplicas > 0, render: value((i) => i.options.minReplicas) },
  { flag: "--max-replicas", when: (i) => i.options.maxReplicas > 0, render: value((i) => i.options.maxReplicas) },
  {
    flag: "--replicas",
    when: (i) => i.options.minReplicas === 0 && i.options.maxReplicas === 0,
    render: value((i) => i.options.replicas),
  },

  // Proxy settings only apply to clusters installed into an existing VPC
  { flag: "--http-proxy", when: (i) => hasSubnets(i) && isSet(i.options.httpProxy), render: value((i) => i.options.httpProxy) },
  { flag: "--https-proxy", when: (i) => hasSubnets(i) && isSet(i.options.httpsProxy), render: value((i) => i.options.httpsProxy) },
  {
    flag: "--additional-trust-bundle-file",
    when: (i) => hasSubnets(i) && isSet(i.options.additionalTrustBundleFile),
    render: value((i) => i.options.additionalTrustBundleFile),
  },
  { flag: "--no-proxy", when: (i) => hasSubnets(i) && isSet(i.options.noProxy), render: value((i) => i.options.noProxy) },

  {
    flag: "--expiration-time",
    when: (i) => (i.options.expirationMs ?? 0) > 0 && i.ocmEnvironment !== PRODUCTION_OCM_ENVIRONMENT,
    render: (i) => [rfc3339(new Date(i.now.getTime() + (i.options.expirationMs ?? 0)))],
  },
];

/** Arguments for `rosa create cluster`, evaluated once from the table above. */
export function buildCreateClusterArgs(input: ClusterArgsInput): string[] {
  const args = ["create", "cluster"];
  for (const arg of CLUSTER_ARGS) {
    if (!arg.when(input)) continue;
    if (!arg.render) {
      args.push(arg.flag);
      continue;
    }
    for (const v of arg.render(input)) {
      args.push(arg.flag, v);
    }
  }
  return args;
}

/** Second-precision UTC timestamp, e.g. 2024-05-01T12:00:00Z. */
export function rfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
