import type { StepContext } from "../context.js";
import { LogKeys } from "../logger.js";
import { writeTextFile } from "../tools/file.js";
import { rosa } from "../tools/rosa.js";

export type ClusterLogKind = "install" | "uninstall";

/**
 * Save `rosa logs <kind>` for the cluster to `<reportDir>/<name>-<kind>.log`.
 * Best effort: failures are logged and the path is undefined.
 */
export async function collectClusterLog(
  ctx: StepContext,
  clusterName: string,
  kind: ClusterLogKind,
  reportDir: string
): Promise<string | undefined> {
  const log = ctx.logger.child({ [LogKeys.clusterName]: clusterName, [LogKeys.clusterLog]: kind });
  try {
    const res = await rosa(ctx.rosa, ["logs", kind, "--cluster", clusterName], { signal: ctx.signal });
    if (!res.ok) {
      log.warn({ stderr: res.stderr }, "Failed to fetch cluster log");
      return undefined;
    }
    const file = await writeTextFile(reportDir, `${clusterName}-${kind}.log`, res.stdout);
    log.info({ file }, "Cluster log saved");
    return file;
  } catch (err) {
    log.warn({ err }, "Failed to save cluster log");
    return undefined;
  }
}
