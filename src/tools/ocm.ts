import { chmod, writeFile } from "node:fs/promises";
import path from "node:path";
import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import { CancelledError, RemoteCallError } from "../errors.js";

const CLUSTERS_MGMT = "/api/clusters_mgmt/v1";

// Offline tokens are exchanged with this public client id
const OFFLINE_TOKEN_CLIENT_ID = "cloud-services";
// Refresh slightly before the server-side expiry
const TOKEN_EXPIRY_SKEW_MS = 60 * 1000;
const REQUEST_TIMEOUT_MS = 60 * 1000;
const PAGE_SIZE = 100;

export type OcmCredentials =
  | { kind: "offline-token"; token: string }
  | { kind: "client-credentials"; clientId: string; clientSecret: string };

/** Live cluster as OCM reports it, reduced to what the lifecycle needs. */
export type ClusterRecord = {
  id: string;
  name: string;
  state: string;
  hostedCP: boolean;
  roleArn?: string;
  operatorRolePrefix?: string;
  oidcConfigId?: string;
  computeNodes?: number;
};

export type OidcConfig = {
  id: string;
  secretArn: string;
  managed: boolean;
};

export type VersionGate = {
  id: string;
  versionRawIdPrefix: string;
  label: string;
  stsOnly: boolean;
  description?: string;
};

export type GateAgreement = {
  id: string;
  versionGateId: string;
};

export interface OcmClient {
  /** Look a ROSA cluster up by name or id; undefined when there is none. */
  findCluster(nameOrId: string, signal?: AbortSignal): Promise<ClusterRecord | undefined>;
  listOidcConfigs(signal?: AbortSignal): Promise<OidcConfig[]>;
  kubeconfig(clusterId: string, signal?: AbortSignal): Promise<string>;
  listVersionGates(signal?: AbortSignal): Promise<VersionGate[]>;
  listGateAgreements(clusterId: string, signal?: AbortSignal): Promise<GateAgreement[]>;
  addGateAgreement(clusterId: string, gateId: string, signal?: AbortSignal): Promise<void>;
}

const ClusterSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    state: z.string().optional().default("unknown"),
    hypershift: z.object({ enabled: z.boolean().optional() }).optional(),
    aws: z
      .object({
        sts: z
          .object({
            role_arn: z.string().optional(),
            operator_role_prefix: z.string().optional(),
            oidc_config: z.object({ id: z.string().optional() }).optional(),
          })
          .optional(),
      })
      .optional(),
    nodes: z.object({ compute: z.number().optional() }).optional(),
  })
  .transform(
    (c): ClusterRecord => ({
      id: c.id,
      name: c.name,
      state: c.state,
      hostedCP: c.hypershift?.enabled ?? false,
      roleArn: c.aws?.sts?.role_arn,
      operatorRolePrefix: c.aws?.sts?.operator_role_prefix,
      oidcConfigId: c.aws?.sts?.oidc_config?.id,
      computeNodes: c.nodes?.compute,
    })
  );

const OidcConfigSchema = z
  .object({
    id: z.string(),
    secret_arn: z.string().optional().default(""),
    managed: z.boolean().optional().default(false),
  })
  .transform((o): OidcConfig => ({ id: o.id, secretArn: o.secret_arn, managed: o.managed }));

const VersionGateSchema = z
  .object({
    id: z.string(),
    version_raw_id_prefix: z.string(),
    label: z.string().optional().default(""),
    sts_only: z.boolean().optional().default(false),
    description: z.string().optional(),
  })
  .transform(
    (g): VersionGate => ({
      id: g.id,
      versionRawIdPrefix: g.version_raw_id_prefix,
      label: g.label,
      stsOnly: g.sts_only,
      description: g.description,
    })
  );

const GateAgreementSchema = z
  .object({
    id: z.string(),
    version_gate: z.object({ id: z.string() }),
  })
  .transform((a): GateAgreement => ({ id: a.id, versionGateId: a.version_gate.id }));

const TokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

const CredentialsSchema = z.object({ kubeconfig: z.string().min(1) });

function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item).optional().default([]),
    total: z.number().optional(),
  });
}

export type OcmClientOptions = {
  apiUrl: string;
  tokenUrl: string;
  credentials: OcmCredentials;
  /** Replaces the HTTP transport; used to run against an in-process fake. */
  adapter?: AxiosAdapter;
  now?: () => number;
};

/** OCM REST client. Bearer tokens are fetched lazily and cached until shortly before expiry. */
export function createOcmClient(options: OcmClientOptions): OcmClient {
  const now = options.now ?? Date.now;
  const sso = axios.create({ timeout: REQUEST_TIMEOUT_MS, adapter: options.adapter });
  const api: AxiosInstance = axios.create({
    baseURL: options.apiUrl,
    timeout: REQUEST_TIMEOUT_MS,
    headers: { "Content-Type": "application/json" },
    adapter: options.adapter,
  });

  let cached: { token: string; expiresAt: number } | undefined;

  const accessToken = async (): Promise<string> => {
    if (cached && cached.expiresAt > now()) return cached.token;

    const form = new URLSearchParams();
    if (options.credentials.kind === "offline-token") {
      form.set("grant_type", "refresh_token");
      form.set("client_id", OFFLINE_TOKEN_CLIENT_ID);
      form.set("refresh_token", options.credentials.token);
    } else {
      form.set("grant_type", "client_credentials");
      form.set("client_id", options.credentials.clientId);
      form.set("client_secret", options.credentials.clientSecret);
    }

    const res = await sso
      .post(options.tokenUrl, form.toString(), {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
      })
      .catch((err: unknown) => Promise.reject(toRemoteCallError(err, "POST token")));
    const token = TokenSchema.safeParse(res.data);
    if (!token.success) {
      throw new RemoteCallError("POST token", { message: "token response has no access_token" });
    }
    const ttlMs = (token.data.expires_in ?? 300) * 1000;
    cached = { token: token.data.access_token, expiresAt: now() + ttlMs - TOKEN_EXPIRY_SKEW_MS };
    return cached.token;
  };

  api.interceptors.request.use(async (config) => {
    config.headers.set("Authorization", `Bearer ${await accessToken()}`);
    return config;
  });

  api.interceptors.response.use(
    (response) => response,
    (error: unknown) => Promise.reject(toRemoteCallError(error))
  );

  const get = async <T extends z.ZodTypeAny>(
    url: string,
    schema: T,
    signal?: AbortSignal,
    params?: Record<string, string | number>
  ): Promise<z.infer<T>> => {
    const res = await api.get<unknown>(url, { params, signal });
    return validate(`GET ${url}`, schema, res.data);
  };

  // OCM search strings are SQL-like: a quote inside a literal is doubled
  const searchLiteral = (text: string) => `'${text.replace(/'/g, "''")}'`;

  const listAll = async <T extends z.ZodTypeAny>(url: string, item: T, signal?: AbortSignal): Promise<z.infer<T>[]> => {
    const all: z.infer<T>[] = [];
    for (let page = 1; ; page++) {
      const data = await get(url, pageOf(item), signal, { page, size: PAGE_SIZE });
      all.push(...data.items);
      if (data.items.length < PAGE_SIZE) return all;
    }
  };

  return {
    async findCluster(nameOrId, signal) {
      const value = searchLiteral(nameOrId);
      const search = `product.id = 'rosa' AND (name = ${value} OR id = ${value})`;
      const data = await get(`${CLUSTERS_MGMT}/clusters`, pageOf(ClusterSchema), signal, { search, page: 1, size: 1 });
      return data.items[0];
    },

    listOidcConfigs(signal) {
      return listAll(`${CLUSTERS_MGMT}/oidc_configs`, OidcConfigSchema, signal);
    },

    async kubeconfig(clusterId, signal) {
      const data = await get(`${CLUSTERS_MGMT}/clusters/${clusterId}/credentials`, CredentialsSchema, signal);
      return data.kubeconfig;
    },

    listVersionGates(signal) {
      return listAll(`${CLUSTERS_MGMT}/version_gates`, VersionGateSchema, signal);
    },

    listGateAgreements(clusterId, signal) {
      return listAll(`${CLUSTERS_MGMT}/clusters/${clusterId}/gate_agreements`, GateAgreementSchema, signal);
    },

    async addGateAgreement(clusterId, gateId, signal) {
      await api.post(`${CLUSTERS_MGMT}/clusters/${clusterId}/gate_agreements`, { version_gate: { id: gateId } }, { signal });
    },
  };
}

/** Fetch the cluster's admin kubeconfig and write it to `<directory>/<clusterId>-kubeconfig`, owner-only. */
export async function writeKubeconfig(
  ocm: OcmClient,
  clusterId: string,
  directory: string,
  signal?: AbortSignal
): Promise<string> {
  const content = await ocm.kubeconfig(clusterId, signal);
  const file = path.join(directory, `${clusterId}-kubeconfig`);
  await writeFile(file, content, { encoding: "utf8", mode: 0o600 });
  // mode is ignored when the file already existed
  await chmod(file, 0o600);
  return file;
}

function validate<T extends z.ZodTypeAny>(label: string, schema: T, data: unknown): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new RemoteCallError(label, { message: `unexpected response: ${parsed.error.issues[0]?.message ?? "invalid"}` });
  }
  return parsed.data;
}

const OcmErrorBodySchema = z.object({ reason: z.string().optional(), error_description: z.string().optional() });

function toRemoteCallError(error: unknown, fallbackLabel = "ocm request"): Error {
  if (axios.isCancel(error)) {
    return new CancelledError("calling the OCM API", { cause: error });
  }
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new RemoteCallError(fallbackLabel, { message: String(error) });
  }
  const label = error.config?.method && error.config.url ? `${error.config.method.toUpperCase()} ${error.config.url}` : fallbackLabel;
  const status = error.response?.status;
  const body = OcmErrorBodySchema.safeParse(error.response?.data);
  const detail = body.success ? (body.data.reason ?? body.data.error_description) : undefined;
  return new RemoteCallError(
    label,
    { message: status !== undefined ? `HTTP ${status}` : error.message, stderr: detail },
    { cause: error }
  );
}
