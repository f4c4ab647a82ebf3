import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

export type TrackedResource = "account-roles" | "oidc-config" | "network-stack";

export type CompensationResult = {
  resource: TrackedResource;
  ok: boolean;
  error?: string;
};

type Compensation = {
  resource: TrackedResource;
  undo: () => Promise<void>;
};

/**
 * Resources created by one create attempt, in creation order. Pre-existing
 * resources are never tracked, so compensation only removes what this
 * attempt made.
 */
export class CreatedResourcesTracker {
  private readonly entries: Compensation[] = [];

  track(resource: TrackedResource, undo: () => Promise<void>): void {
    this.entries.push({ resource, undo });
  }

  get resources(): TrackedResource[] {
    return this.entries.map((e) => e.resource);
  }

  /**
   * Undo tracked resources newest first. Every compensation runs even when
   * an earlier one fails; failures are logged, never thrown.
   */
  async compensate(logger: Logger): Promise<CompensationResult[]> {
    const results: CompensationResult[] = [];
    for (const entry of [...this.entries].reverse()) {
      logger.info({ resource: entry.resource }, "Cleaning up after cluster creation failure");
      try {
        await entry.undo();
        results.push({ resource: entry.resource, ok: true });
      } catch (err) {
        logger.error({ resource: entry.resource, err }, "Cleanup after cluster creation failure failed");
        results.push({ resource: entry.resource, ok: false, error: describeError(err) });
      }
    }
    this.entries.length = 0;
    return results;
  }
}
