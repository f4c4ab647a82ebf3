const COMMAND_HELP: Record<string, string> = {
  create: `
rosa-cluster create --cluster-name <name> --version <x.y.z> [options]

Create a cluster and wait until it is installed and healthy. Prints
{"clusterId": "..."} on success.

Topology:
  --hosted-cp                        Hosted control plane (implies --sts)
  --sts                              STS account roles and OIDC config
  --private-link                     Private link cluster in a provisioned VPC
  --multi-az                         Spread over three zones (at least 3 replicas)
  --fips, --mint-mode, --etcd-encryption, --enable-autoscaling

Sizing and network:
  --channel-group <group>            stable (default), candidate, fast, nightly
  --compute-machine-type <type>      Default m5.xlarge
  --replicas <n>                     Default 2
  --min-replicas <n> --max-replicas <n>
  --machine-cidr <cidr>              Default 10.0.0.0/16
  --pod-cidr <cidr> --service-cidr <cidr> --host-prefix <n>
  --network-type <type>
  --http-proxy <url> --https-proxy <url> --no-proxy <list>
  --additional-trust-bundle-file <file>
  --properties <k:v,k:v>

Existing resources:
  --oidc-config-id <id>              Skip OIDC config provisioning
  --subnet-ids <private,public>      Skip VPC provisioning
  --billing-account <id>             Default: the logged-in AWS account
  --use-default-account-roles-prefix Share ManagedOpenShift-<x.y> roles

Timing and output:
  --install-timeout <minutes>        Default 30 (hosted) or 120
  --health-check-timeout <minutes>   Default 20 (hosted) or 45
  --expiration <minutes>             Ignored in production OCM
  --skip-health-check
  --artifact-dir <dir>
  --working-dir <dir>                Default <tmp>/rosa-cluster/<name>
`,
  delete: `
rosa-cluster delete --cluster-name <name-or-id> [options]

Delete a cluster, then the operator roles, OIDC resources, VPC and account
roles that belong to it.

  --hosted-cp                        Hosted control plane (implies --sts and --delete-hosted-vpc)
  --sts, --private-link, --mint-mode
  --delete-oidc-config               Also delete the cluster's OIDC config
  --delete-hosted-vpc                Destroy the VPC in --working-dir (default <tmp>/rosa-cluster/<name>)
  --uninstall-timeout <minutes>      Default 30
  --artifact-dir <dir> --working-dir <dir>
`,
  versions: `
rosa-cluster versions [--channel-group <group>] [--hosted-cp] [--constraints <range,range>]

List installable versions as JSON. Comma-separated ranges are combined with
OR, e.g. --constraints "~4.13,>=4.15".
`,
  regions: `
rosa-cluster regions [--hosted-cp] [--multi-az]

List regions as JSON.
`,
  "upgrade-gate": `
rosa-cluster upgrade-gate --cluster-id <id> --current-version <x.y.z> --target-version <x.y.z>

Acknowledge the version gate an upgrade to the target version needs.
`,
};

export function isCommand(command: string): boolean {
  return command in COMMAND_HELP;
}

export function showHelp(command?: string): void {
  if (command && COMMAND_HELP[command]) {
    console.error(COMMAND_HELP[command].trim());
    return;
  }

  console.error("rosa-cluster: managed OpenShift on AWS cluster lifecycle");
  console.error("");
  console.error("Usage:");
  console.error("  rosa-cluster <command> [options]");
  console.error("");
  console.error("Commands:");
  console.error("  create          Create a cluster and wait until it is ready");
  console.error("  delete          Delete a cluster and its resources");
  console.error("  versions        List available versions");
  console.error("  regions         List available regions");
  console.error("  upgrade-gate    Acknowledge the version gate for an upgrade");
  console.error("  help [command]  Show help");
  console.error("");
  console.error("Environment:");
  console.error("  OCM_TOKEN or OCM_CLIENT_ID/OCM_CLIENT_SECRET, OCM_ENV (production, stage, integration, fedramp-*)");
  console.error("  AWS_PROFILE or AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY, AWS_REGION (or \"random\")");
  console.error("  ROSA_BINARY, TERRAFORM_BINARY, ROSA_POLL_INTERVAL_SECONDS, LOG_LEVEL");
}
