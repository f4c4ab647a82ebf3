import type { VpcContext } from "../context.js";
import { InconsistentStateError, ValidationError } from "../errors.js";
import { LogKeys } from "../logger.js";
import { copyAsset } from "../tools/file.js";
import type { TerraformOutputValue, TerraformVars } from "../tools/terraform.js";

export const HCP_VPC_TEMPLATE = "setup-hcp-vpc.tf";
export const PRIVATE_LINK_VPC_TEMPLATE = "setup-private-link-vpc.tf";
export const VPC_CONFIG_FILE = "setup-vpc.tf";

export type NetworkStack = {
  privateSubnet: string;
  publicSubnet: string;
  /** Hosted control plane only. */
  nodePrivateSubnet?: string;
};

export type VpcRequest = {
  clusterName: string;
  region: string;
  workingDir: string;
};

export type CreateVpcRequest = VpcRequest & {
  hostedCP: boolean;
  privateLink: boolean;
};

/** Subnet ids in the order the create call takes them. */
export function subnetIdsOf(stack: NetworkStack): string {
  return `${stack.privateSubnet},${stack.publicSubnet}`;
}

export function vpcTemplate(hostedCP: boolean, privateLink: boolean): string | undefined {
  if (hostedCP) return HCP_VPC_TEMPLATE;
  if (privateLink) return PRIVATE_LINK_VPC_TEMPLATE;
  return undefined;
}

/**
 * Provision the VPC in `workingDir` from the bundled template. The Terraform
 * state left there is what `deleteVpc` destroys later.
 */
export async function createVpc(ctx: VpcContext, req: CreateVpcRequest): Promise<NetworkStack> {
  checkRequest(req);
  const template = vpcTemplate(req.hostedCP, req.privateLink);
  if (!template) {
    throw new ValidationError("vpc", ["a vpc is only provisioned for hosted control plane or private link clusters"]);
  }

  const log = ctx.logger.child({ [LogKeys.clusterName]: req.clusterName, [LogKeys.workingDir]: req.workingDir });
  await copyAsset(template, req.workingDir, VPC_CONFIG_FILE);

  const tf = ctx.infra(req.workingDir);
  log.info("Creating vpc");
  await tf.init(ctx.signal);
  await tf.plan(vpcVars(req), ctx.signal);
  await tf.apply(ctx.signal);

  const outputs = await tf.output(ctx.signal);
  const stack: NetworkStack = {
    privateSubnet: requireOutput(outputs, "cluster-private-subnet"),
    publicSubnet: requireOutput(outputs, "cluster-public-subnet"),
  };
  if (req.hostedCP) {
    stack.nodePrivateSubnet = requireOutput(outputs, "node-private-subnet");
  }

  log.info({ subnets: subnetIdsOf(stack) }, "Vpc created");
  return stack;
}

export async function deleteVpc(ctx: VpcContext, req: VpcRequest): Promise<void> {
  checkRequest(req);
  const log = ctx.logger.child({ [LogKeys.clusterName]: req.clusterName, [LogKeys.workingDir]: req.workingDir });

  const tf = ctx.infra(req.workingDir);
  log.info("Deleting vpc");
  await tf.init(ctx.signal);
  await tf.destroy(vpcVars(req), ctx.signal);
  log.info("Vpc deleted");
}

function vpcVars(req: VpcRequest): TerraformVars {
  return { aws_region: req.region, cluster_name: req.clusterName };
}

function checkRequest(req: VpcRequest): void {
  const violations: string[] = [];
  if (!req.clusterName) violations.push("cluster name is required");
  if (!req.region) violations.push("aws region is required");
  if (!req.workingDir) violations.push("working directory is required");
  if (violations.length > 0) {
    throw new ValidationError("vpc", violations);
  }
}

function requireOutput(outputs: Record<string, TerraformOutputValue>, name: string): string {
  const value = outputs[name]?.value.replace(/"/g, "");
  if (!value) {
    throw new InconsistentStateError(`terraform output "${name}" is missing`);
  }
  return value;
}
