import type { StepContext } from "../context.js";
import { InconsistentStateError } from "../errors.js";
import { LogKeys } from "../logger.js";
import { AccountRoleListSchema, AccountRoleRow, rosa, rosaJson, rosaOk } from "../tools/rosa.js";
import { expectOk } from "../tools/shell.js";

export const DEFAULT_ACCOUNT_ROLES_PREFIX = "ManagedOpenShift";

// rosa names the hosted-control-plane variants `<prefix>-HCP-ROSA-<Type>-Role`
const HCP_ROLE_MARKER = "HCP-ROSA-";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Role names rosa creates for exactly `prefix`; `demo` does not match `demo-2-Installer-Role`. */
export function accountRoleNamePattern(prefix: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}-(${HCP_ROLE_MARKER})?(ControlPlane|Installer|Support|Worker)-Role$`);
}

export type AccountRoles = {
  controlPlane: string;
  installer: string;
  support: string;
  worker: string;
  hcpInstaller?: string;
  hcpSupport?: string;
  hcpWorker?: string;
};

type RoleSlot = keyof AccountRoles;

const CLASSIC_SLOTS: Record<string, RoleSlot> = {
  "Control plane": "controlPlane",
  Installer: "installer",
  Support: "support",
  Worker: "worker",
};

const HCP_SLOTS: Record<string, RoleSlot> = {
  Installer: "hcpInstaller",
  Support: "hcpSupport",
  Worker: "hcpWorker",
};

export function accountRolesPrefix(clusterName: string, roleVersion: string, useDefaultPrefix: boolean): string {
  return useDefaultPrefix ? `${DEFAULT_ACCOUNT_ROLES_PREFIX}-${roleVersion}` : clusterName;
}

/** Number of roles a complete set holds: 4 classic roles, plus 3 hosted-control-plane ones. */
export function validRoleCounts(restricted: boolean, hostedCP: boolean): number[] {
  if (restricted) return [4];
  return hostedCP ? [7] : [4, 7];
}

/**
 * Classify listed roles into slots. Only rows named `<prefix>-<Type>-Role` at
 * `version` are kept; HCP rows are ignored on the restricted partition.
 */
export function classifyAccountRoles(
  rows: AccountRoleRow[],
  prefix: string,
  version: string,
  restricted: boolean
): { slots: Partial<AccountRoles>; count: number } {
  const slots: Partial<AccountRoles> = {};
  let count = 0;

  const pattern = accountRoleNamePattern(prefix);
  for (const row of rows) {
    const match = pattern.exec(row.RoleName);
    if (match === null || row.Version !== version) continue;

    const hcp = match[1] !== undefined;
    if (hcp && restricted) continue;

    const slot = (hcp ? HCP_SLOTS : CLASSIC_SLOTS)[row.RoleType];
    if (slot === undefined) {
      throw new InconsistentStateError(`account role "${row.RoleName}" has unknown type "${row.RoleType}"`);
    }
    if (slots[slot] !== undefined) {
      throw new InconsistentStateError(`more than one ${row.RoleType} account role found for prefix "${prefix}"`);
    }
    slots[slot] = row.RoleARN;
    count++;
  }
  return { slots, count };
}

/**
 * Find the complete role set for `prefix` at `version`. Returns undefined
 * when none exist; a partial or oversized set is an InconsistentStateError.
 */
export async function getAccountRoles(
  ctx: StepContext,
  prefix: string,
  version: string,
  hostedCP: boolean
): Promise<AccountRoles | undefined> {
  const rows = await rosaJson(ctx.rosa, ["list", "account-roles", "--output", "json"], AccountRoleListSchema, {
    signal: ctx.signal,
  });

  const { slots, count } = classifyAccountRoles(rows, prefix, version, ctx.restricted);
  if (count === 0) return undefined;

  const expected = validRoleCounts(ctx.restricted, hostedCP);
  const { controlPlane, installer, support, worker } = slots;
  if (!expected.includes(count) || !controlPlane || !installer || !support || !worker) {
    throw new InconsistentStateError(
      `found ${count} account roles with prefix "${prefix}" and version "${version}", expected ${expected.join(" or ")}`
    );
  }
  return { ...slots, controlPlane, installer, support, worker };
}

export type ResolveAccountRolesRequest = {
  prefix: string;
  version: string;
  channelGroup: string;
  hostedCP: boolean;
};

/** Get the role set, creating it when absent. `created` is false when it already existed. */
export async function resolveAccountRoles(
  ctx: StepContext,
  req: ResolveAccountRolesRequest
): Promise<{ roles: AccountRoles; created: boolean }> {
  const log = ctx.logger.child({ [LogKeys.prefix]: req.prefix, [LogKeys.version]: req.version });

  const existing = await getAccountRoles(ctx, req.prefix, req.version, req.hostedCP);
  if (existing) {
    log.info("Account roles already exist");
    return { roles: existing, created: false };
  }

  log.info("Creating account roles");
  await rosaOk(
    ctx.rosa,
    [
      "create",
      "account-roles",
      "--prefix",
      req.prefix,
      "--version",
      req.version,
      "--channel-group",
      req.channelGroup,
      "--mode",
      "auto",
      "--yes",
    ],
    { signal: ctx.signal }
  );

  const roles = await getAccountRoles(ctx, req.prefix, req.version, req.hostedCP);
  if (!roles) {
    throw new InconsistentStateError(`account roles with prefix "${req.prefix}" not found after creation`);
  }
  log.info("Account roles created");
  return { roles, created: true };
}

const NO_ROLES_PATTERN = /no (account )?roles? (found|exist)/i;

/** Delete every account role under `prefix`. Nothing to delete counts as success. */
export async function deleteAccountRoles(ctx: StepContext, prefix: string): Promise<void> {
  const args = ["delete", "account-roles", "--prefix", prefix, "--mode", "auto", "--yes"];
  const res = await rosa(ctx.rosa, args, { signal: ctx.signal });

  if (!res.ok && NO_ROLES_PATTERN.test(`${res.stderr}\n${res.stdout}`)) {
    ctx.logger.info({ [LogKeys.prefix]: prefix }, "No account roles to delete");
    return;
  }
  expectOk("rosa delete account-roles", res);
  ctx.logger.info({ [LogKeys.prefix]: prefix }, "Account roles deleted");
}
