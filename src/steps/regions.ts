import { z } from "zod";
import type { StepContext } from "../context.js";
import { RegionError, describeError } from "../errors.js";
import { LogKeys } from "../logger.js";
import { Region, RegionSchema, rosaJson } from "../tools/rosa.js";

export type RegionFilter = {
  hostedCP?: boolean;
  multiAZ?: boolean;
};

export async function listRegions(ctx: StepContext, filter: RegionFilter = {}): Promise<Region[]> {
  const args = ["list", "regions", "--output", "json"];
  if (filter.hostedCP) args.push("--hosted-cp");
  if (filter.multiAZ) args.push("--multi-az");
  return rosaJson(ctx.rosa, args, z.array(RegionSchema), { signal: ctx.signal });
}

/** Fail unless `region` is offered, and enabled, for the requested topology. */
export async function regionCheck(ctx: StepContext, region: string, hostedCP: boolean, multiAZ: boolean): Promise<void> {
  let regions: Region[];
  try {
    regions = await listRegions(ctx, { hostedCP, multiAZ });
  } catch (err) {
    throw new RegionError(`listing regions: ${describeError(err)}`, { cause: err });
  }

  const match = regions.find((r) => r.id === region);
  if (!match) {
    const topology = [hostedCP ? "hosted control plane" : "", multiAZ ? "multi-az" : ""].filter(Boolean).join(", ");
    throw new RegionError(`region "${region}" is not available${topology ? ` for ${topology} clusters` : ""}`);
  }
  if (!match.enabled) {
    throw new RegionError(`region "${region}" is not enabled`);
  }

  ctx.logger.info({ [LogKeys.awsRegion]: region, hostedCP, multiAZ }, "Region is available");
}

/** Pick one enabled region at random. */
export async function selectRandomRegion(ctx: StepContext, random: () => number = Math.random): Promise<string> {
  let regions: Region[];
  try {
    regions = await listRegions(ctx);
  } catch (err) {
    throw new RegionError(`listing regions: ${describeError(err)}`, { cause: err });
  }

  const enabled = shuffle(
    regions.filter((r) => r.enabled).map((r) => r.id),
    random
  );
  const region = enabled[0];
  if (region === undefined) {
    throw new RegionError("no enabled regions are available");
  }

  ctx.logger.info({ [LogKeys.awsRegion]: region }, "Selected random region");
  return region;
}

function shuffle<T>(items: T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
