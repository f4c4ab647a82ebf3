import {
  AccountRolesError,
  ClusterError,
  PollTimeoutError,
  RemoteCallError,
  ValidationError,
  VpcError,
  describeError,
  formatDuration,
  withPhase,
} from "../src/errors.js";

describe("errors", () => {
  test("ValidationError lists every violation", () => {
    const err = new ValidationError("create cluster options", ["cluster name is required", "cluster version is required"]);
    expect(err.message).toBe("create cluster options: cluster name is required; cluster version is required");
    expect(err.violations).toHaveLength(2);
    expect(err.name).toBe("ValidationError");
  });

  test("RemoteCallError carries exit code and trimmed stderr", () => {
    const err = new RemoteCallError("rosa create cluster", { exitCode: 1, stderr: "  quota exceeded\n" });
    expect(err.message).toBe("rosa create cluster: exit code 1, stderr: quota exceeded");
    expect(err.exitCode).toBe(1);
    expect(err.stderr).toBe("quota exceeded");
  });

  test("phase errors name the action and keep the cause", () => {
    const cause = new PollTimeoutError('cluster "demo" to be installed', 30 * 60 * 1000);
    const err = new ClusterError("create", cause, "abc123");

    expect(err.message).toBe('create cluster failed: timed out after 30m waiting for cluster "demo" to be installed');
    expect(err.cause).toBe(cause);
    expect(err.clusterId).toBe("abc123");
    expect(err.action).toBe("create");
  });

  test("nested phase errors read outermost first", () => {
    const err = new ClusterError("create", new VpcError("create", new Error("terraform apply failed")));
    expect(err.message).toBe("create cluster failed: create vpc failed: terraform apply failed");
  });

  test("withPhase wraps failures and passes results through", async () => {
    await expect(withPhase(async () => 42, (e) => new AccountRolesError("create", e))).resolves.toBe(42);

    const failed = withPhase(
      async () => {
        throw new Error("denied");
      },
      (e) => new AccountRolesError("create", e)
    );
    await expect(failed).rejects.toBeInstanceOf(AccountRolesError);
    await expect(failed).rejects.toThrow("create account roles failed: denied");
  });

  test("describeError handles non-errors", () => {
    expect(describeError("plain")).toBe("plain");
    expect(describeError(new Error("wrapped"))).toBe("wrapped");
  });

  test("formatDuration", () => {
    expect(formatDuration(500)).toBe("500ms");
    expect(formatDuration(45_000)).toBe("45s");
    expect(formatDuration(120_000)).toBe("2m");
    expect(formatDuration(150_000)).toBe("2m 30s");
  });
});
