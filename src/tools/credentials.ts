export type AwsCredentials = {
  profile?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  region: string;
};

/**
 * Check that either a profile or an access key pair is present, and a region.
 * Returns the list of problems; empty means usable.
 */
export function checkAwsCredentials(creds: Partial<AwsCredentials>): string[] {
  const problems: string[] = [];
  const byProfile = Boolean(creds.profile);
  const byKeys = Boolean(creds.accessKeyId && creds.secretAccessKey);

  if (!byProfile && !byKeys) {
    problems.push("aws credentials are not supplied (set AWS_PROFILE or AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY)");
  }
  if (!creds.region) {
    problems.push("aws region is not supplied (set AWS_REGION)");
  }
  return problems;
}

/** Environment entries handed to every child process. A profile wins over access keys. */
export function credentialsAsEnv(creds: AwsCredentials): Record<string, string> {
  if (creds.profile) {
    return { AWS_PROFILE: creds.profile };
  }
  if (creds.accessKeyId && creds.secretAccessKey) {
    return {
      AWS_ACCESS_KEY_ID: creds.accessKeyId,
      AWS_SECRET_ACCESS_KEY: creds.secretAccessKey,
    };
  }
  return {};
}

/** GovCloud regions belong to the restricted (FedRAMP) partition. */
export function isRestrictedPartition(region: string): boolean {
  return region.includes("gov");
}
