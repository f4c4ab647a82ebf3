import type { StepContext } from "../context.js";
import { ValidationError } from "../errors.js";
import { LogKeys } from "../logger.js";
import type { OidcConfig } from "../tools/ocm.js";
import { CreatedOidcConfigSchema, rosaJson, rosaOk } from "../tools/rosa.js";

/** First OIDC config whose secret ARN carries `prefix`. */
export async function findOidcConfig(ctx: StepContext, prefix: string): Promise<OidcConfig | undefined> {
  const configs = await ctx.ocm.listOidcConfigs(ctx.signal);
  return configs.find((c) => c.secretArn.includes(prefix));
}

export async function resolveOidcConfig(
  ctx: StepContext,
  prefix: string,
  installerRoleArn: string
): Promise<{ id: string; created: boolean }> {
  const violations: string[] = [];
  if (!prefix) violations.push("prefix is required");
  if (!installerRoleArn) violations.push("installer role arn is required");
  if (violations.length > 0) {
    throw new ValidationError("oidc config", violations);
  }

  const existing = await findOidcConfig(ctx, prefix);
  if (existing) {
    ctx.logger.info({ [LogKeys.prefix]: prefix, [LogKeys.oidcConfigId]: existing.id }, "OIDC config already exists");
    return { id: existing.id, created: false };
  }

  const args = ["create", "oidc-config", "--output", "json", "--mode", "auto", "--yes"];
  // The restricted partition only supports OCM-managed configs
  if (!ctx.restricted) {
    args.push("--managed=false", "--prefix", prefix, "--installer-role-arn", installerRoleArn);
  }

  ctx.logger.info({ [LogKeys.prefix]: prefix, managed: ctx.restricted }, "Creating OIDC config");
  const created = await rosaJson(ctx.rosa, args, CreatedOidcConfigSchema, { signal: ctx.signal });
  ctx.logger.info({ [LogKeys.prefix]: prefix, [LogKeys.oidcConfigId]: created.id }, "OIDC config created");
  return { id: created.id, created: true };
}

export async function deleteOidcConfig(ctx: StepContext, id: string): Promise<void> {
  await rosaOk(ctx.rosa, ["delete", "oidc-config", "--mode", "auto", "--oidc-config-id", id, "--yes"], {
    signal: ctx.signal,
  });
  ctx.logger.info({ [LogKeys.oidcConfigId]: id }, "OIDC config deleted");
}

/** Delete the cluster's OIDC provider, by config id when known and by cluster otherwise. */
export async function deleteOidcProvider(ctx: StepContext, clusterId: string, oidcConfigId?: string): Promise<void> {
  const args = ["delete", "oidc-provider", "--mode", "auto", "--yes"];
  if (oidcConfigId) {
    args.push("--oidc-config-id", oidcConfigId);
  } else {
    args.push("--cluster", clusterId);
  }
  await rosaOk(ctx.rosa, args, { signal: ctx.signal });
  ctx.logger.info({ [LogKeys.clusterId]: clusterId, [LogKeys.oidcConfigId]: oidcConfigId }, "OIDC provider deleted");
}
