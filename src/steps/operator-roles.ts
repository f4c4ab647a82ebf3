import type { StepContext } from "../context.js";
import { LogKeys } from "../logger.js";
import { rosaOk } from "../tools/rosa.js";

/** Delete the per-cluster operator roles, by the prefix recorded on the cluster when there is one. */
export async function deleteOperatorRoles(ctx: StepContext, clusterId: string, prefix?: string): Promise<void> {
  const args = ["delete", "operator-roles", "--mode", "auto", "--yes"];
  if (prefix) {
    args.push("--prefix", prefix);
  } else {
    args.push("--cluster", clusterId);
  }
  await rosaOk(ctx.rosa, args, { signal: ctx.signal });
  ctx.logger.info({ [LogKeys.clusterId]: clusterId, [LogKeys.prefix]: prefix }, "Operator roles deleted");
}
