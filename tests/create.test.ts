import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createCluster } from "../src/create.js";
import { CancelledError, ClusterError } from "../src/errors.js";
import { CLASSIC_HEALTH_CHECK_TIMEOUT_MS, resolveCreateOptions } from "../src/options.js";
import type { CreateClusterInput } from "../src/schema.js";
import { FakeRunner, fail, flagValue, json, ok } from "./helpers/fake-runner.js";
import { TestContext, makeContext, roleRows } from "./helpers/fakes.js";

const DESCRIBE = ["describe", "cluster"];
const CREATE_CLUSTER = ["create", "cluster"];

function describing(state: string) {
  return json({ id: "c1", name: "demo", status: { state } });
}

/** Answers for a hosted cluster whose roles either exist already or are created on demand. */
function scriptHostedCluster(runner: FakeRunner, options: { rolesExist: boolean; prefix?: string }) {
  const rows = roleRows(options.prefix ?? "demo", "4.14", { hcp: true });
  runner.on("rosa", ["list", "regions"], json([{ id: "us-east-1", enabled: true, supports_hypershift: true }]));
  if (!options.rolesExist) {
    runner.once("rosa", ["list", "account-roles"], ok("")).on("rosa", ["create", "account-roles"], ok());
  }
  runner
    .on("rosa", ["list", "account-roles"], json(rows))
    .on("rosa", ["create", "oidc-config"], json({ id: "oidc-1" }))
    .on("rosa", ["delete", "oidc-config"], ok())
    .on("rosa", ["delete", "account-roles"], ok());
}

describe("createCluster", () => {
  let dir: string;
  let ctx: TestContext;

  const options = (input: CreateClusterInput) =>
    resolveCreateOptions({ clusterName: "demo", version: "4.14.3", workingDir: dir, artifactDir: dir, ...input });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rosa-create-test-"));
    ctx = makeContext();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("provisions a hosted cluster end to end", async () => {
    scriptHostedCluster(ctx.runner, { rolesExist: false });
    ctx.runner
      .on("rosa", CREATE_CLUSTER, json({ id: "c1", name: "demo" }))
      .once("rosa", DESCRIBE, describing("installing"))
      .on("rosa", DESCRIBE, describing("ready"));

    await expect(createCluster(ctx, options({ hostedCP: true, skipHealthCheck: true }))).resolves.toBe("c1");

    const [create] = ctx.runner.callsTo("rosa", CREATE_CLUSTER);
    expect(flagValue(create, "--oidc-config-id")).toBe("oidc-1");
    expect(flagValue(create, "--subnet-ids")).toBe("subnet-private,subnet-public");
    expect(flagValue(create, "--role-arn")).toBe("arn:aws:iam::123456789012:role/demo-HCP-ROSA-Installer-Role");
    expect(ctx.runner.callsTo("rosa", ["list", "regions"])[0]).toEqual(["list", "regions", "--output", "json", "--hosted-cp"]);
    expect(ctx.runner.callsTo("rosa", DESCRIBE)).toHaveLength(2);
    expect(ctx.fakeInfra.ops()).toEqual(["init", "plan", "apply", "output"]);
    expect(ctx.runner.callsTo("rosa", ["delete"])).toHaveLength(0);
    expect(ctx.fakeHealth.requests).toHaveLength(0);
  });

  test("removes only what this attempt created when the create call fails", async () => {
    scriptHostedCluster(ctx.runner, { rolesExist: true });
    ctx.runner.on("rosa", CREATE_CLUSTER, fail("quota exceeded"));

    const create = createCluster(ctx, options({ hostedCP: true }));

    await expect(create).rejects.toBeInstanceOf(ClusterError);
    await expect(create).rejects.toThrow("create cluster failed: rosa create cluster: exit code 1, stderr: quota exceeded");
    expect(ctx.fakeInfra.ops()).toEqual(["init", "plan", "apply", "output", "init", "destroy"]);
    expect(ctx.runner.callsTo("rosa", ["delete", "oidc-config"])).toEqual([
      ["delete", "oidc-config", "--mode", "auto", "--oidc-config-id", "oidc-1", "--yes"],
    ]);
    expect(ctx.runner.callsTo("rosa", ["delete", "account-roles"])).toHaveLength(0);
  });

  test("undoes everything newest first when the vpc apply fails", async () => {
    scriptHostedCluster(ctx.runner, { rolesExist: false });
    ctx.fakeInfra.failOn = "apply";

    const create = createCluster(ctx, options({ hostedCP: true }));

    await expect(create).rejects.toThrow("create cluster failed: create vpc failed: terraform apply failed");
    expect(ctx.fakeInfra.ops()).toEqual(["init", "plan", "apply", "init", "destroy"]);
    const deletes = ctx.runner.callsTo("rosa", ["delete"]).map((args) => args[1]);
    expect(deletes).toEqual(["oidc-config", "account-roles"]);
    expect(ctx.runner.callsTo("rosa", CREATE_CLUSTER)).toHaveLength(0);
  });

  test("leaves roles under the shared prefix alone", async () => {
    scriptHostedCluster(ctx.runner, { rolesExist: false, prefix: "ManagedOpenShift-4.14" });
    ctx.runner.on("rosa", CREATE_CLUSTER, fail("quota exceeded"));

    await expect(createCluster(ctx, options({ hostedCP: true, useDefaultAccountRolesPrefix: true }))).rejects.toThrow(
      ClusterError
    );
    expect(flagValue(ctx.runner.callsTo("rosa", ["create", "account-roles"])[0], "--prefix")).toBe("ManagedOpenShift-4.14");
    expect(ctx.runner.callsTo("rosa", ["delete", "account-roles"])).toHaveLength(0);
  });

  test("rejects a hosted control plane on the restricted partition before provisioning", async () => {
    ctx = makeContext({ restricted: true });

    const create = createCluster(ctx, options({ hostedCP: true }));

    await expect(create).rejects.toThrow(
      "create cluster failed: create cluster options: hosted control plane clusters are not supported on the restricted partition"
    );
    expect(ctx.runner.calls).toHaveLength(0);
    expect(ctx.fakeInfra.ops()).toEqual([]);
  });

  test("rejects bad options before any call", async () => {
    const create = createCluster(ctx, options({ clusterName: "", version: "" }));

    await expect(create).rejects.toThrow(
      "create cluster failed: create cluster options: cluster name is required; cluster version is required"
    );
    expect(ctx.runner.calls).toHaveLength(0);
  });

  test("stops at the region check", async () => {
    ctx.runner.on("rosa", ["list", "regions"], json([{ id: "eu-west-1", enabled: true }]));

    await expect(createCluster(ctx, options({ hostedCP: true }))).rejects.toThrow(
      'create cluster failed: region check failed: region "us-east-1" is not available for hosted control plane clusters'
    );
    expect(ctx.runner.calls).toHaveLength(1);
  });

  test("saves the install log and keeps the cluster id when installation fails", async () => {
    ctx.runner
      .on("rosa", ["list", "regions"], json([{ id: "us-east-1", enabled: true }]))
      .on("rosa", CREATE_CLUSTER, json({ id: "c1" }))
      .on("rosa", DESCRIBE, describing("error"))
      .on("rosa", ["logs", "install"], ok("bootstrap failed"));

    let caught: unknown;
    try {
      await createCluster(ctx, options({ skipHealthCheck: true }));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ClusterError);
    expect(caught instanceof ClusterError && caught.clusterId).toBe("c1");
    expect(caught instanceof Error && caught.message).toBe('create cluster failed: cluster "demo" entered state "error"');
    await expect(readFile(path.join(dir, "demo-install.log"), "utf8")).resolves.toBe("bootstrap failed\n");
    expect(ctx.runner.callsTo("rosa", ["delete"])).toHaveLength(0);
  });

  test("does not fetch logs after a cancelled install wait", async () => {
    const controller = new AbortController();
    ctx = makeContext({ signal: controller.signal });
    ctx.runner
      .on("rosa", ["list", "regions"], json([{ id: "us-east-1", enabled: true }]))
      .on("rosa", CREATE_CLUSTER, json({ id: "c1" }))
      .on("rosa", DESCRIBE, () => {
        controller.abort();
        return describing("installing");
      });

    const create = createCluster(ctx, options({ skipHealthCheck: true }));

    await expect(create).rejects.toThrow(ClusterError);
    await expect(create.catch((err: unknown) => (err instanceof ClusterError ? err.cause : err))).resolves.toBeInstanceOf(
      CancelledError
    );
    expect(ctx.runner.callsTo("rosa", ["logs"])).toHaveLength(0);
  });

  test("checks health with the expected node count", async () => {
    ctx.runner
      .on("rosa", ["list", "regions"], json([{ id: "us-east-1", enabled: true }]))
      .on("rosa", CREATE_CLUSTER, json({ id: "c-health" }))
      .on("rosa", DESCRIBE, json({ id: "c-health", name: "demo", status: { state: "ready" } }));
    ctx.fakeHealth.error = new Error("job openshift-monitoring/osd-cluster-ready failed");

    const create = createCluster(ctx, options({}));

    await expect(create).rejects.toThrow("create cluster failed: job openshift-monitoring/osd-cluster-ready failed");
    expect(ctx.fakeHealth.requests).toEqual([
      {
        kubeconfig: path.join(os.tmpdir(), "c-health-kubeconfig"),
        hostedCP: false,
        expectedComputeNodes: 2,
        artifactDir: dir,
        clusterName: "demo",
        timeoutMs: CLASSIC_HEALTH_CHECK_TIMEOUT_MS,
        signal: undefined,
      },
    ]);
    await rm(path.join(os.tmpdir(), "c-health-kubeconfig"), { force: true });
  });
});
