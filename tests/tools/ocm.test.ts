import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { RemoteCallError } from "../../src/errors.js";
import { OcmCredentials, createOcmClient, writeKubeconfig } from "../../src/tools/ocm.js";
import { FakeOcm } from "../helpers/fakes.js";

const API_URL = "https://api.example.test";
const TOKEN_URL = "https://sso.example.test/token";
const OFFLINE: OcmCredentials = { kind: "offline-token", token: "test-token" };

type Reply = { status: number; data: unknown };

/** In-process stand-in for the OCM and SSO servers. */
function fakeServer(route: (config: InternalAxiosRequestConfig) => Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = route(config);
    const response: AxiosResponse = { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_REQUEST, config, undefined, response);
    }
    return response;
  };
  const tokenRequests = () => requests.filter((r) => r.url === TOKEN_URL);
  const apiRequests = () => requests.filter((r) => r.url !== TOKEN_URL);
  return { adapter, requests, tokenRequests, apiRequests };
}

const TOKEN_REPLY: Reply = { status: 200, data: { access_token: "test-access-token", expires_in: 900 } };

const CLUSTER = {
  id: "c1",
  name: "demo",
  state: "ready",
  hypershift: { enabled: true },
  aws: { sts: { role_arn: "arn:aws:iam::123456789012:role/demo-HCP-ROSA-Installer-Role", operator_role_prefix: "demo-a1b2", oidc_config: { id: "oidc-1" } } },
  nodes: { compute: 3 },
};

function defaultRoute(config: InternalAxiosRequestConfig): Reply {
  if (config.url === TOKEN_URL) return TOKEN_REPLY;
  if (config.url === "/api/clusters_mgmt/v1/clusters") return { status: 200, data: { items: [CLUSTER], total: 1 } };
  return { status: 404, data: { reason: `no route for ${config.url}` } };
}

describe("createOcmClient", () => {
  test("finds a cluster by name or id with a bearer token", async () => {
    const server = fakeServer(defaultRoute);
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter });

    await expect(ocm.findCluster("demo")).resolves.toEqual({
      id: "c1",
      name: "demo",
      state: "ready",
      hostedCP: true,
      roleArn: "arn:aws:iam::123456789012:role/demo-HCP-ROSA-Installer-Role",
      operatorRolePrefix: "demo-a1b2",
      oidcConfigId: "oidc-1",
      computeNodes: 3,
    });

    const [request] = server.apiRequests();
    expect(request.baseURL).toBe(API_URL);
    expect(request.params).toEqual({ search: "product.id = 'rosa' AND (name = 'demo' OR id = 'demo')", page: 1, size: 1 });
    expect(request.headers.get("Authorization")).toBe("Bearer test-access-token");
  });

  test("quotes the name inside the search string", async () => {
    const server = fakeServer(defaultRoute);
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter });

    await ocm.findCluster("x' OR name = 'y");

    expect(server.apiRequests()[0].params).toEqual({
      search: "product.id = 'rosa' AND (name = 'x'' OR name = ''y' OR id = 'x'' OR name = ''y')",
      page: 1,
      size: 1,
    });
  });

  test("returns undefined when no cluster matches", async () => {
    const server = fakeServer((config) => (config.url === TOKEN_URL ? TOKEN_REPLY : { status: 200, data: { items: [] } }));
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter });

    await expect(ocm.findCluster("ghost")).resolves.toBeUndefined();
  });

  test("exchanges an offline token once until it is about to expire", async () => {
    let now = 0;
    const server = fakeServer(defaultRoute);
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter, now: () => now });

    await ocm.findCluster("demo");
    await ocm.findCluster("demo");
    expect(server.tokenRequests()).toHaveLength(1);
    expect(server.tokenRequests()[0].data).toBe("grant_type=refresh_token&client_id=cloud-services&refresh_token=test-token");

    // 900s lifetime minus the 60s refresh margin
    now = 840_001;
    await ocm.findCluster("demo");
    expect(server.tokenRequests()).toHaveLength(2);
  });

  test("uses the client credentials grant for service accounts", async () => {
    const server = fakeServer(defaultRoute);
    const ocm = createOcmClient({
      apiUrl: API_URL,
      tokenUrl: TOKEN_URL,
      credentials: { kind: "client-credentials", clientId: "test-client", clientSecret: "test-secret" },
      adapter: server.adapter,
    });

    await ocm.findCluster("demo");
    expect(server.tokenRequests()[0].data).toBe("grant_type=client_credentials&client_id=test-client&client_secret=test-secret");
  });

  test("reports a rejected token exchange", async () => {
    const server = fakeServer(() => ({ status: 401, data: { error: "invalid_grant", error_description: "Invalid refresh token" } }));
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter });

    const find = ocm.findCluster("demo");
    await expect(find).rejects.toBeInstanceOf(RemoteCallError);
    await expect(find).rejects.toThrow(`POST ${TOKEN_URL}: HTTP 401, stderr: Invalid refresh token`);
    expect(server.apiRequests()).toHaveLength(0);
  });

  test("maps HTTP errors to remote call errors", async () => {
    const server = fakeServer((config) =>
      config.url === TOKEN_URL ? TOKEN_REPLY : { status: 404, data: { kind: "Error", reason: "Cluster 'c9' not found" } }
    );
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter });

    await expect(ocm.kubeconfig("c9")).rejects.toThrow(
      "GET /api/clusters_mgmt/v1/clusters/c9/credentials: HTTP 404, stderr: Cluster 'c9' not found"
    );
  });

  test("follows pages until a short one", async () => {
    const secret = (i: number) => ({ id: `oidc-${i}`, secret_arn: `arn:aws:secretsmanager:us-east-1:123456789012:secret:cfg-${i}` });
    const server = fakeServer((config) => {
      if (config.url === TOKEN_URL) return TOKEN_REPLY;
      const page: unknown = config.params?.page;
      const items = page === 1 ? Array.from({ length: 100 }, (_, i) => secret(i)) : [secret(100)];
      return { status: 200, data: { items } };
    });
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter });

    const configs = await ocm.listOidcConfigs();

    expect(configs).toHaveLength(101);
    expect(configs[100]).toEqual({
      id: "oidc-100",
      secretArn: "arn:aws:secretsmanager:us-east-1:123456789012:secret:cfg-100",
      managed: false,
    });
    expect(server.apiRequests().map((r) => r.params)).toEqual([
      { page: 1, size: 100 },
      { page: 2, size: 100 },
    ]);
  });

  test("lists version gates and posts gate agreements", async () => {
    const server = fakeServer((config) => {
      if (config.url === TOKEN_URL) return TOKEN_REPLY;
      if (config.url === "/api/clusters_mgmt/v1/version_gates") {
        return {
          status: 200,
          data: { items: [{ id: "g1", version_raw_id_prefix: "4.14", label: "api.openshift.com/gate-ocp", sts_only: false }] },
        };
      }
      return { status: 201, data: {} };
    });
    const ocm = createOcmClient({ apiUrl: API_URL, tokenUrl: TOKEN_URL, credentials: OFFLINE, adapter: server.adapter });

    await expect(ocm.listVersionGates()).resolves.toEqual([
      { id: "g1", versionRawIdPrefix: "4.14", label: "api.openshift.com/gate-ocp", stsOnly: false, description: undefined },
    ]);

    await ocm.addGateAgreement("c1", "g1");
    const post = server.apiRequests()[1];
    expect(post.method).toBe("post");
    expect(post.url).toBe("/api/clusters_mgmt/v1/clusters/c1/gate_agreements");
    expect(post.data).toBe(JSON.stringify({ version_gate: { id: "g1" } }));
  });
});

describe("writeKubeconfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rosa-kubeconfig-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("writes the kubeconfig readable by the owner only", async () => {
    const file = await writeKubeconfig(new FakeOcm(), "c1", dir);

    expect(file).toBe(path.join(dir, "c1-kubeconfig"));
    await expect(readFile(file, "utf8")).resolves.toBe("apiVersion: v1\nkind: Config\n# c1\n");
    expect((await stat(file)).mode & 0o777).toBe(0o600);
  });
});
