import semver from "semver";
import { z } from "zod";
import type { StepContext } from "../context.js";
import { VersionError, describeError } from "../errors.js";
import { LogKeys } from "../logger.js";
import { Version, VersionSchema, rosaJson } from "../tools/rosa.js";
import { waitFor } from "../wait.js";

export const NIGHTLY_CHANNEL_GROUP = "nightly";
export const NIGHTLY_WAIT_TIMEOUT_MS = 5 * 60 * 1000;

/** Label OCM puts on the gates that guard an OpenShift minor upgrade. */
export const OCP_GATE_LABEL = "api.openshift.com/gate-ocp";

export async function listVersions(
  ctx: StepContext,
  channelGroup: string,
  hostedCP: boolean,
  constraints: string[] = []
): Promise<Version[]> {
  const args = ["list", "versions", "--channel-group", channelGroup, "--output", "json"];
  if (hostedCP) args.push("--hosted-cp");

  let versions: Version[];
  try {
    versions = await rosaJson(ctx.rosa, args, z.array(VersionSchema), { signal: ctx.signal });
  } catch (err) {
    throw new VersionError("list", describeError(err), { cause: err });
  }
  return filterVersions(versions, constraints);
}

/**
 * Keep the versions whose raw id satisfies any of the constraints, in
 * constraint order and without duplicates. No constraints keeps everything.
 */
export function filterVersions(versions: Version[], constraints: string[]): Version[] {
  if (constraints.length === 0) return versions;

  for (const v of versions) {
    if (semver.valid(v.rawId) === null) {
      throw new VersionError("filter", `"${v.rawId}" is not a semantic version`);
    }
  }

  const seen = new Set<string>();
  const out: Version[] = [];
  for (const constraint of constraints) {
    const range = semver.validRange(constraint);
    if (range === null) {
      throw new VersionError("filter", `invalid constraint "${constraint}"`);
    }
    for (const v of versions) {
      if (!seen.has(v.id) && semver.satisfies(v.rawId, range)) {
        seen.add(v.id);
        out.push(v);
      }
    }
  }
  return out;
}

/** "4.14.3" -> "4.14". Throws VersionError on anything that is not a version. */
export function majorMinor(version: string): string {
  const parsed = semver.parse(version) ?? semver.coerce(version);
  if (parsed === null) {
    throw new VersionError("parse", `"${version}" is not a semantic version`);
  }
  return `${parsed.major}.${parsed.minor}`;
}

/** Poll the nightly channel until a version id containing `version` is published. */
export async function waitForNightlyVersion(
  ctx: StepContext,
  version: string,
  hostedCP: boolean,
  timeoutMs = NIGHTLY_WAIT_TIMEOUT_MS
): Promise<void> {
  ctx.logger.info({ [LogKeys.version]: version }, "Waiting for nightly version to be available");
  await waitFor(
    async () => {
      const versions = await listVersions(ctx, NIGHTLY_CHANNEL_GROUP, hostedCP);
      return versions.some((v) => v.id.includes(version));
    },
    {
      timeoutMs,
      intervalMs: ctx.pollIntervalMs,
      signal: ctx.signal,
      description: `nightly version "${version}" to be available`,
    }
  );
}

/** A target on a lower minor than the current one never needs an agreement. */
export function requiresGateAgreement(currentVersion: string, targetVersion: string): boolean {
  const current = semver.coerce(currentVersion);
  const target = semver.coerce(targetVersion);
  if (current === null || target === null) {
    throw new VersionError("compare", `cannot compare "${currentVersion}" with "${targetVersion}"`);
  }
  if (target.major !== current.major) return target.major > current.major;
  return target.minor >= current.minor;
}

export type GateAgreementOutcome = "not-required" | "no-gate" | "already-agreed" | "added";

/**
 * Acknowledge the version gate that guards the upgrade to `targetVersion`,
 * unless none is needed or the cluster has already agreed to it.
 */
export async function addGateAgreement(
  ctx: StepContext,
  clusterId: string,
  currentVersion: string,
  targetVersion: string
): Promise<GateAgreementOutcome> {
  if (!requiresGateAgreement(currentVersion, targetVersion)) {
    return "not-required";
  }

  const prefix = majorMinor(targetVersion);
  const gates = await ctx.ocm.listVersionGates(ctx.signal);
  const gate = gates.find((g) => g.versionRawIdPrefix === prefix && g.label === OCP_GATE_LABEL);
  if (!gate) {
    ctx.logger.info({ [LogKeys.clusterId]: clusterId, [LogKeys.version]: prefix }, "No version gate for target version");
    return "no-gate";
  }

  const agreements = await ctx.ocm.listGateAgreements(clusterId, ctx.signal);
  if (agreements.some((a) => a.versionGateId === gate.id)) {
    return "already-agreed";
  }

  await ctx.ocm.addGateAgreement(clusterId, gate.id, ctx.signal);
  ctx.logger.info({ [LogKeys.clusterId]: clusterId, gateId: gate.id }, "Version gate agreement added");
  return "added";
}
