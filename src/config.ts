import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import { AwsCredentials, checkAwsCredentials } from "./tools/credentials.js";
import type { OcmCredentials } from "./tools/ocm.js";

const SSO_TOKEN_URL = "https://sso.redhat.com/auth/realms/redhat-external/protocol/openid-connect/token";
const FEDRAMP_TOKEN_URL = "https://sso.int.openshiftusgov.com/realms/redhat-external/protocol/openid-connect/token";

export type OcmEnvironment = {
  apiUrl: string;
  tokenUrl: string;
  fedramp: boolean;
};

export const OCM_ENVIRONMENTS = {
  production: { apiUrl: "https://api.openshift.com", tokenUrl: SSO_TOKEN_URL, fedramp: false },
  stage: { apiUrl: "https://api.stage.openshift.com", tokenUrl: SSO_TOKEN_URL, fedramp: false },
  integration: { apiUrl: "https://api.integration.openshift.com", tokenUrl: SSO_TOKEN_URL, fedramp: false },
  "fedramp-production": { apiUrl: "https://api.openshiftusgov.com", tokenUrl: FEDRAMP_TOKEN_URL, fedramp: true },
  "fedramp-stage": { apiUrl: "https://api.stage.openshiftusgov.com", tokenUrl: FEDRAMP_TOKEN_URL, fedramp: true },
  "fedramp-integration": { apiUrl: "https://api.int.openshiftusgov.com", tokenUrl: FEDRAMP_TOKEN_URL, fedramp: true },
} as const satisfies Record<string, OcmEnvironment>;

export type OcmEnvironmentName = keyof typeof OCM_ENVIRONMENTS;

/** Region value that asks for a random enabled region. */
export const RANDOM_REGION = "random";

// Unset and empty variables are treated alike
const optional = z.preprocess((v) => (v === "" ? undefined : v), z.string().optional());

const EnvSchema = z.object({
  OCM_TOKEN: optional,
  OCM_CLIENT_ID: optional,
  OCM_CLIENT_SECRET: optional,
  OCM_ENV: z.enum(["production", "stage", "integration", "fedramp-production", "fedramp-stage", "fedramp-integration"]).default("production"),

  AWS_PROFILE: optional,
  AWS_ACCESS_KEY_ID: optional,
  AWS_SECRET_ACCESS_KEY: optional,
  AWS_REGION: optional,

  ROSA_BINARY: z.string().min(1).default("rosa"),
  TERRAFORM_BINARY: z.string().min(1).default("terraform"),
  ROSA_POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(30),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type RosaConfig = {
  ocm: OcmEnvironment & { environment: OcmEnvironmentName; credentials: OcmCredentials };
  aws: AwsCredentials;
  rosaBinary: string;
  terraformBinary: string;
  pollIntervalMs: number;
  logLevel: LogLevel;
};

/**
 * Read configuration from the environment. Every problem is reported at
 * once in a single ValidationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RosaConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      "configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  const violations: string[] = [];

  let credentials: OcmCredentials | undefined;
  if (e.OCM_CLIENT_ID && e.OCM_CLIENT_SECRET) {
    credentials = { kind: "client-credentials", clientId: e.OCM_CLIENT_ID, clientSecret: e.OCM_CLIENT_SECRET };
  } else if (e.OCM_TOKEN) {
    credentials = { kind: "offline-token", token: e.OCM_TOKEN };
  } else {
    violations.push("ocm credentials are not supplied (set OCM_TOKEN or OCM_CLIENT_ID/OCM_CLIENT_SECRET)");
  }

  const aws = {
    profile: e.AWS_PROFILE,
    accessKeyId: e.AWS_ACCESS_KEY_ID,
    secretAccessKey: e.AWS_SECRET_ACCESS_KEY,
    region: e.AWS_REGION ?? "",
  };
  violations.push(...checkAwsCredentials(aws));

  if (!credentials || violations.length > 0) {
    throw new ValidationError("configuration", violations);
  }

  return {
    ocm: { environment: e.OCM_ENV, ...OCM_ENVIRONMENTS[e.OCM_ENV], credentials },
    aws,
    rosaBinary: e.ROSA_BINARY,
    terraformBinary: e.TERRAFORM_BINARY,
    pollIntervalMs: e.ROSA_POLL_INTERVAL_SECONDS * 1000,
    logLevel: e.LOG_LEVEL,
  };
}
