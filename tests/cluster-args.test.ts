import { buildCreateClusterArgs, rfc3339 } from "../src/cluster-args.js";
import { ProvisionedResources, resolveCreateOptions } from "../src/options.js";
import type { CreateClusterInput } from "../src/schema.js";
import type { AccountRoles } from "../src/steps/account-roles.js";
import { flagValue } from "./helpers/fake-runner.js";
import { ACCOUNT_ID, arn } from "./helpers/fakes.js";

const ROLES: AccountRoles = {
  controlPlane: arn("demo-ControlPlane-Role"),
  installer: arn("demo-Installer-Role"),
  support: arn("demo-Support-Role"),
  worker: arn("demo-Worker-Role"),
  hcpInstaller: arn("demo-HCP-ROSA-Installer-Role"),
  hcpSupport: arn("demo-HCP-ROSA-Support-Role"),
  hcpWorker: arn("demo-HCP-ROSA-Worker-Role"),
};

const NOW = new Date("2024-05-01T12:00:00.000Z");

function argsFor(input: CreateClusterInput, resources: ProvisionedResources = {}, ocmEnvironment = "stage"): string[] {
  return buildCreateClusterArgs({
    options: resolveCreateOptions({ clusterName: "demo", version: "4.14.3", ...input }),
    resources,
    region: "us-east-1",
    ocmEnvironment,
    awsAccountId: ACCOUNT_ID,
    now: NOW,
  });
}

describe("buildCreateClusterArgs", () => {
  test("hosted control plane cluster", () => {
    const args = argsFor(
      { hostedCP: true },
      { accountRoles: ROLES, oidcConfigId: "oidc-1", subnetIds: "subnet-a,subnet-b" }
    );

    expect(args).toEqual([
      "create",
      "cluster",
      "--output",
      "json",
      "--cluster-name",
      "demo",
      "--channel-group",
      "stable",
      "--compute-machine-type",
      "m5.xlarge",
      "--machine-cidr",
      "10.0.0.0/16",
      "--region",
      "us-east-1",
      "--version",
      "4.14.3",
      "--oidc-config-id",
      "oidc-1",
      "--yes",
      "--mode",
      "auto",
      "--hosted-cp",
      "--role-arn",
      ROLES.hcpInstaller,
      "--support-role-arn",
      ROLES.hcpSupport,
      "--worker-iam-role",
      ROLES.hcpWorker,
      "--billing-account",
      ACCOUNT_ID,
      "--subnet-ids",
      "subnet-a,subnet-b",
      "--sts",
      "--replicas",
      "2",
    ]);
  });

  test("classic STS cluster passes the classic roles", () => {
    const args = argsFor({ sts: true }, { accountRoles: ROLES, oidcConfigId: "oidc-1" });

    expect(args.slice(args.indexOf("--yes") + 1, args.indexOf("--mode"))).toEqual([
      "--role-arn",
      ROLES.installer,
      "--controlplane-iam-role",
      ROLES.controlPlane,
      "--support-role-arn",
      ROLES.support,
      "--worker-iam-role",
      ROLES.worker,
    ]);
    expect(args).not.toContain("--hosted-cp");
    expect(args).not.toContain("--billing-account");
  });

  test("an explicit billing account wins over the logged-in account", () => {
    const args = argsFor({ hostedCP: true }, { accountRoles: ROLES, billingAccountId: "999999999999" });
    expect(flagValue(args, "--billing-account")).toBe("999999999999");
  });

  test("multi-az raises replicas to three", () => {
    const args = argsFor({ multiAZ: true, replicas: 1 });
    expect(args).toContain("--multi-az");
    expect(flagValue(args, "--replicas")).toBe("3");
  });

  test("autoscaling bounds replace the replica count", () => {
    const args = argsFor({ enableAutoscaling: true, minReplicas: 2, maxReplicas: 4 });
    expect(flagValue(args, "--min-replicas")).toBe("2");
    expect(flagValue(args, "--max-replicas")).toBe("4");
    expect(args).not.toContain("--replicas");
  });

  test("expiration is only set outside production", () => {
    expect(flagValue(argsFor({ expirationMs: 60 * 60 * 1000 }), "--expiration-time")).toBe("2024-05-01T13:00:00Z");
    expect(argsFor({ expirationMs: 60 * 60 * 1000 }, {}, "production")).not.toContain("--expiration-time");
  });

  test("private link clusters use the template's machine cidr", () => {
    const args = argsFor({ privateLink: true, machineCidr: "192.168.0.0/16" }, { subnetIds: "subnet-a,subnet-b" });
    expect(flagValue(args, "--machine-cidr")).toBe("10.0.0.0/16");
    expect(args).toContain("--private-link");
  });

  test("proxy settings need existing subnets", () => {
    const proxy = { httpProxy: "http://proxy:3128", httpsProxy: "http://proxy:3128", noProxy: ".internal" };

    expect(argsFor(proxy)).not.toContain("--http-proxy");

    const args = argsFor(proxy, { subnetIds: "subnet-a,subnet-b" });
    expect(flagValue(args, "--http-proxy")).toBe("http://proxy:3128");
    expect(flagValue(args, "--https-proxy")).toBe("http://proxy:3128");
    expect(flagValue(args, "--no-proxy")).toBe(".internal");
  });

  test("only non-default network types are passed", () => {
    expect(argsFor({ networkType: "OVNKubernetes" })).not.toContain("--network-type");
    expect(flagValue(argsFor({ networkType: "OpenShiftSDN" }), "--network-type")).toBe("OpenShiftSDN");
  });

  test("each property repeats the flag", () => {
    const args = argsFor({ properties: { provision_shard_id: "abc", owner: "qa" } });
    expect(args.slice(args.indexOf("--properties"), args.indexOf("--properties") + 4)).toEqual([
      "--properties",
      "provision_shard_id:abc",
      "--properties",
      "owner:qa",
    ]);
  });

  test("optional network settings appear only when set", () => {
    const args = argsFor({ podCidr: "10.128.0.0/14", serviceCidr: "172.30.0.0/16", hostPrefix: 23 });
    expect(flagValue(args, "--pod-cidr")).toBe("10.128.0.0/14");
    expect(flagValue(args, "--service-cidr")).toBe("172.30.0.0/16");
    expect(flagValue(args, "--host-prefix")).toBe("23");
    expect(argsFor({})).not.toContain("--host-prefix");
  });
});

describe("rfc3339", () => {
  test("drops milliseconds", () => {
    expect(rfc3339(new Date("2024-01-02T03:04:05.678Z"))).toBe("2024-01-02T03:04:05Z");
  });
});
