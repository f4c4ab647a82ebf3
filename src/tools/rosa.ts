import { z } from "zod";
import { RemoteCallError } from "../errors.js";
import { CommandRunner, ShellResult, expectOk, parseJsonOutput } from "./shell.js";

export type RosaCli = {
  binary: string;
  runner: CommandRunner;
  /** Extra environment entries, e.g. OCM_CONFIG pointing at the login state. */
  env?: Record<string, string>;
};

export type RosaCallOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

// Cluster creation and deletion requests return quickly; applies of roles
// and OIDC resources can take a few minutes.
const ROSA_TIMEOUT_MS = 10 * 60 * 1000;

export async function rosa(cli: RosaCli, args: string[], opts?: RosaCallOptions): Promise<ShellResult> {
  return cli.runner.run(cli.binary, args, {
    env: cli.env,
    signal: opts?.signal,
    timeoutMs: opts?.timeoutMs ?? ROSA_TIMEOUT_MS,
  });
}

/** Run rosa and throw a RemoteCallError carrying stderr on failure. */
export async function rosaOk(cli: RosaCli, args: string[], opts?: RosaCallOptions): Promise<ShellResult> {
  return expectOk(commandLabel(args), await rosa(cli, args, opts));
}

/** Run rosa and validate its JSON output against `schema`. */
export async function rosaJson<T extends z.ZodTypeAny>(
  cli: RosaCli,
  args: string[],
  schema: T,
  opts?: RosaCallOptions
): Promise<z.infer<T>> {
  const label = commandLabel(args);
  const res = await rosaOk(cli, args, opts);
  // Some list commands print nothing instead of an empty array
  const parsed = schema.safeParse(parseJsonOutput(label, res.stdout || "null"));
  if (!parsed.success) {
    throw new RemoteCallError(label, { message: `unexpected output: ${parsed.error.issues.map(formatIssue).join(", ")}` });
  }
  return parsed.data;
}

/** "rosa <verb> [<noun>]", without flags or their values. */
export function commandLabel(args: string[]): string {
  const end = args.findIndex((a) => a.startsWith("-"));
  return `rosa ${args.slice(0, end === -1 ? 2 : Math.min(end, 2)).join(" ")}`;
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

// ---------------------------------------------------------------------------
// Output schemas

export const AccountRoleRowSchema = z.object({
  RoleName: z.string(),
  RoleARN: z.string(),
  RoleType: z.string(),
  Version: z.string().optional().default(""),
});
export type AccountRoleRow = z.infer<typeof AccountRoleRowSchema>;

// `rosa list account-roles -o json` prints nothing at all when no roles exist
export const AccountRoleListSchema = z.array(AccountRoleRowSchema).nullable().transform((rows) => rows ?? []);

export const RegionSchema = z
  .object({
    id: z.string(),
    display_name: z.string().optional(),
    enabled: z.boolean(),
    ccs_only: z.boolean().optional().default(false),
    supports_hypershift: z.boolean().optional().default(false),
    supports_multi_az: z.boolean().optional().default(false),
  })
  .transform((r) => ({
    id: r.id,
    displayName: r.display_name ?? r.id,
    enabled: r.enabled,
    ccsOnly: r.ccs_only,
    supportsHostedCP: r.supports_hypershift,
    supportsMultiAZ: r.supports_multi_az,
  }));
export type Region = z.infer<typeof RegionSchema>;

export const VersionSchema = z
  .object({
    id: z.string(),
    raw_id: z.string(),
    channel_group: z.string().optional().default("stable"),
    enabled: z.boolean().optional().default(true),
    default: z.boolean().optional().default(false),
    rosa_enabled: z.boolean().optional().default(false),
    hosted_control_plane_enabled: z.boolean().optional().default(false),
    available_upgrades: z.array(z.string()).optional().default([]),
    end_of_life_timestamp: z.string().optional(),
  })
  .transform((v) => ({
    id: v.id,
    rawId: v.raw_id,
    channelGroup: v.channel_group,
    enabled: v.enabled,
    isDefault: v.default,
    rosaEnabled: v.rosa_enabled,
    hostedCPEnabled: v.hosted_control_plane_enabled,
    availableUpgrades: v.available_upgrades,
    endOfLife: v.end_of_life_timestamp,
  }));
export type Version = z.infer<typeof VersionSchema>;

export const CreatedOidcConfigSchema = z.object({ id: z.string().min(1) });

export const CreatedClusterSchema = z.object({ id: z.string().min(1), name: z.string().optional() });

export const DescribedClusterSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.object({ state: z.string() }),
});

export const WhoamiSchema = z
  .object({
    "AWS Account ID": z.string(),
    "AWS Default Region": z.string().optional(),
  })
  .transform((w) => ({ awsAccountId: w["AWS Account ID"], awsDefaultRegion: w["AWS Default Region"] }));
export type AccountInfo = z.infer<typeof WhoamiSchema>;
