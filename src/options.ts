import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import {
  CreateClusterInput,
  CreateClusterInputSchema,
  DeleteClusterInput,
  DeleteClusterInputSchema,
} from "./schema.js";
import type { AccountRoles } from "./steps/account-roles.js";

const MINUTE_MS = 60 * 1000;

export const HCP_INSTALL_TIMEOUT_MS = 30 * MINUTE_MS;
export const CLASSIC_INSTALL_TIMEOUT_MS = 120 * MINUTE_MS;
export const HCP_HEALTH_CHECK_TIMEOUT_MS = 20 * MINUTE_MS;
export const CLASSIC_HEALTH_CHECK_TIMEOUT_MS = 45 * MINUTE_MS;
export const UNINSTALL_TIMEOUT_MS = 30 * MINUTE_MS;

export const DEFAULT_REPLICAS = 2;
export const MULTI_AZ_MIN_REPLICAS = 3;

type ParsedCreateInput = z.output<typeof CreateClusterInputSchema>;

export type CreateClusterOptions = Readonly<
  Omit<ParsedCreateInput, "replicas" | "installTimeoutMs" | "healthCheckTimeoutMs" | "artifactDir" | "workingDir" | "properties"> & {
    replicas: number;
    installTimeoutMs: number;
    healthCheckTimeoutMs: number;
    artifactDir: string;
    workingDir: string;
    properties: Readonly<Record<string, string>>;
  }
>;

export type DeleteClusterOptions = Readonly<
  Omit<z.output<typeof DeleteClusterInputSchema>, "artifactDir" | "workingDir" | "uninstallTimeoutMs"> & {
    artifactDir: string;
    workingDir: string;
    uninstallTimeoutMs: number;
  }
>;

/** What the saga provisioned or looked up. Kept apart from the caller's options. */
export type ProvisionedResources = {
  accountRoles?: AccountRoles;
  oidcConfigId?: string;
  subnetIds?: string;
  billingAccountId?: string;
};

/** Apply every default once and freeze. Schema violations become one ValidationError. */
export function resolveCreateOptions(input: CreateClusterInput): CreateClusterOptions {
  const parsed = parseInput("create cluster options", CreateClusterInputSchema, input);

  const hostedCP = parsed.hostedCP;
  let replicas = parsed.replicas || DEFAULT_REPLICAS;
  if (parsed.multiAZ && replicas < MULTI_AZ_MIN_REPLICAS) {
    replicas = MULTI_AZ_MIN_REPLICAS;
  }

  return Object.freeze({
    ...parsed,
    sts: hostedCP || parsed.sts,
    replicas,
    installTimeoutMs: parsed.installTimeoutMs ?? (hostedCP ? HCP_INSTALL_TIMEOUT_MS : CLASSIC_INSTALL_TIMEOUT_MS),
    healthCheckTimeoutMs:
      parsed.healthCheckTimeoutMs ?? (hostedCP ? HCP_HEALTH_CHECK_TIMEOUT_MS : CLASSIC_HEALTH_CHECK_TIMEOUT_MS),
    artifactDir: parsed.artifactDir ?? os.tmpdir(),
    workingDir: parsed.workingDir ?? defaultWorkingDir(parsed.clusterName),
    properties: Object.freeze({ ...parsed.properties }),
  });
}

/** Default Terraform working directory: `<tmp>/rosa-cluster/<cluster>`. */
export function defaultWorkingDir(clusterName: string): string {
  return path.join(os.tmpdir(), "rosa-cluster", clusterName);
}

export function resolveDeleteOptions(input: DeleteClusterInput): DeleteClusterOptions {
  const parsed = parseInput("delete cluster options", DeleteClusterInputSchema, input);
  return Object.freeze({
    ...parsed,
    sts: parsed.hostedCP || parsed.sts,
    deleteHostedVPC: parsed.hostedCP || parsed.deleteHostedVPC,
    artifactDir: parsed.artifactDir ?? os.tmpdir(),
    workingDir: parsed.workingDir ?? defaultWorkingDir(parsed.clusterName),
    uninstallTimeoutMs: parsed.uninstallTimeoutMs ?? UNINSTALL_TIMEOUT_MS,
  });
}

const CLUSTER_NAME_PATTERN = /^[a-z]([-a-z0-9]*[a-z0-9])?$/;

/**
 * Checks that need nothing provisioned yet. Run before any cloud call.
 * The restricted partition has no hosted-control-plane account roles.
 */
export function preflightViolations(options: CreateClusterOptions, restricted = false): string[] {
  const violations: string[] = [];
  if (!options.clusterName) {
    violations.push("cluster name is required");
  } else if (!CLUSTER_NAME_PATTERN.test(options.clusterName)) {
    violations.push(`cluster name "${options.clusterName}" must be lowercase alphanumerics or '-', starting with a letter`);
  }
  if (!options.version) {
    violations.push("cluster version is required");
  }
  if (options.minReplicas > 0 && options.maxReplicas > 0 && options.minReplicas > options.maxReplicas) {
    violations.push("min replicas must not exceed max replicas");
  }
  if (restricted && options.hostedCP) {
    violations.push("hosted control plane clusters are not supported on the restricted partition");
  }
  return violations;
}

/** Everything the create call needs, checked together once provisioning is done. */
export function createCallViolations(
  options: CreateClusterOptions,
  resources: ProvisionedResources,
  restricted = false
): string[] {
  const violations = preflightViolations(options, restricted);

  if (options.hostedCP) {
    if (!resources.oidcConfigId) violations.push("oidc config id is required for hosted control plane clusters");
    if (!resources.subnetIds) violations.push("subnet ids are required for hosted control plane clusters");
  }

  if (options.hostedCP || options.sts) {
    const roles = resources.accountRoles;
    if (!roles?.controlPlane) violations.push("iam role arn for control plane is required");
    if (!roles?.installer) violations.push("iam role arn for installer is required");
    if (!roles?.support) violations.push("iam role arn for support role is required");
    if (!roles?.worker) violations.push("iam role arn for worker role is required");
    if (options.hostedCP) {
      if (!roles?.hcpInstaller) violations.push("iam role arn for hosted control plane installer is required");
      if (!roles?.hcpSupport) violations.push("iam role arn for hosted control plane support role is required");
      if (!roles?.hcpWorker) violations.push("iam role arn for hosted control plane worker role is required");
    }
  }
  return violations;
}

/** Parse caller input, turning every schema issue into one ValidationError. */
export function parseInput<T extends z.ZodTypeAny>(subject: string, schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      subject,
      parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    );
  }
  return parsed.data;
}
