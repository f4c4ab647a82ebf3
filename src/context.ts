import type { Logger } from "./logger.js";
import type { HealthChecker } from "./tools/kubectl.js";
import type { OcmClient } from "./tools/ocm.js";
import type { RosaCli } from "./tools/rosa.js";
import type { InfraExecutorFactory } from "./tools/terraform.js";

/** Collaborators shared by the step helpers for one call. */
export type StepContext = {
  rosa: RosaCli;
  ocm: OcmClient;
  logger: Logger;
  /** FedRAMP (GovCloud) partition: no hosted-control-plane roles, managed OIDC configs. */
  restricted: boolean;
  pollIntervalMs?: number;
  signal?: AbortSignal;
};

export type VpcContext = {
  infra: InfraExecutorFactory;
  logger: Logger;
  signal?: AbortSignal;
};

/** Everything the create and delete sagas need. */
export type LifecycleContext = StepContext &
  VpcContext & {
    health: HealthChecker;
    /** OCM environment alias, e.g. "production" or "stage". */
    ocmEnvironment: string;
    /** AWS account of the logged-in identity; default billing account for hosted clusters. */
    awsAccountId: string;
    region: string;
  };
