import { z } from "zod";

// CLI flags arrive as strings ("true", "3"); library callers pass real values
const flag = z
  .union([z.boolean(), z.string()])
  .transform((v, ctx) => {
    if (typeof v === "boolean") return v;
    if (v === "true") return true;
    if (v === "false") return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${v}"` });
    return z.NEVER;
  })
  .default(false);
const numeric = z.union([z.number(), z.string()]);
const count = numeric.pipe(z.coerce.number().int().nonnegative());
const duration = numeric.pipe(z.coerce.number().int().positive());
const optionalText = z.string().min(1).optional();

export const CreateClusterInputSchema = z.object({
  clusterName: z.string().default(""),
  version: z.string().default(""),
  channelGroup: z.string().min(1).default("stable"),

  hostedCP: flag,
  multiAZ: flag,
  sts: flag,
  privateLink: flag,
  mintMode: flag,
  fips: flag,
  enableAutoscaling: flag,
  etcdEncryption: flag,
  useDefaultAccountRolesPrefix: flag,
  skipHealthCheck: flag,

  computeMachineType: z.string().min(1).default("m5.xlarge"),
  replicas: count.optional(), // 0 or unset means the default of 2
  minReplicas: count.default(0),
  maxReplicas: count.default(0),

  machineCidr: z.string().min(1).default("10.0.0.0/16"),
  podCidr: optionalText,
  serviceCidr: optionalText,
  hostPrefix: count.default(0),
  networkType: optionalText,

  httpProxy: optionalText,
  httpsProxy: optionalText,
  noProxy: optionalText,
  additionalTrustBundleFile: optionalText,

  properties: z.record(z.string()).default({}),

  installTimeoutMs: duration.optional(),
  healthCheckTimeoutMs: duration.optional(),
  expirationMs: duration.optional(),

  artifactDir: optionalText,
  workingDir: optionalText,

  // Pre-existing resources; when set the matching provisioning step is skipped
  oidcConfigId: optionalText,
  subnetIds: optionalText,
  billingAccountId: optionalText,
});

export type CreateClusterInput = z.input<typeof CreateClusterInputSchema>;

export const DeleteClusterInputSchema = z.object({
  clusterName: z.string().min(1, "cluster name or id is required"),
  hostedCP: flag,
  sts: flag,
  privateLink: flag,
  mintMode: flag,
  deleteHostedVPC: flag,
  deleteOidcConfig: flag,
  artifactDir: optionalText,
  workingDir: optionalText,
  uninstallTimeoutMs: duration.optional(),
});

export type DeleteClusterInput = z.input<typeof DeleteClusterInputSchema>;

export const VersionsInputSchema = z.object({
  channelGroup: z.string().min(1).default("stable"),
  hostedCP: flag,
  constraints: z.array(z.string().min(1)).default([]),
});

export type VersionsInput = z.input<typeof VersionsInputSchema>;

export const RegionsInputSchema = z.object({
  hostedCP: flag,
  multiAZ: flag,
});

export type RegionsInput = z.input<typeof RegionsInputSchema>;

export const UpgradeGateInputSchema = z.object({
  clusterId: z.string().min(1, "cluster id is required"),
  currentVersion: z.string().min(1, "current version is required"),
  targetVersion: z.string().min(1, "target version is required"),
});

export type UpgradeGateInput = z.input<typeof UpgradeGateInputSchema>;
