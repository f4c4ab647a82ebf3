import { z } from "zod";
import { RemoteCallError } from "../errors.js";
import { CommandRunner, expectOk, parseJsonOutput } from "./shell.js";

export type TerraformVars = Record<string, string>;

export type TerraformOutputValue = {
  /** Raw JSON text of the value, e.g. `"subnet-0abc"` including the quotes. */
  value: string;
  sensitive: boolean;
};

/** Declarative-infra executor bound to one working directory. */
export interface InfraExecutor {
  readonly workingDir: string;
  init(signal?: AbortSignal): Promise<void>;
  plan(vars: TerraformVars, signal?: AbortSignal): Promise<void>;
  apply(signal?: AbortSignal): Promise<void>;
  destroy(vars: TerraformVars, signal?: AbortSignal): Promise<void>;
  output(signal?: AbortSignal): Promise<Record<string, TerraformOutputValue>>;
}

/** Builds an executor for one working directory. Credentials are bound by the factory. */
export type InfraExecutorFactory = (workingDir: string) => InfraExecutor;

const OutputSchema = z.record(
  z.object({
    sensitive: z.boolean().optional().default(false),
    type: z.unknown().optional(),
    value: z.unknown(),
  })
);

// Plans are written next to the configuration so `apply` runs exactly what was planned
const PLAN_FILE = "rosa-vpc.tfplan";
const APPLY_TIMEOUT_MS = 30 * 60 * 1000;

/** Terraform executor shelling out to the `terraform` binary. */
export function createTerraform(options: {
  runner: CommandRunner;
  workingDir: string;
  env?: Record<string, string>;
  binary?: string;
}): InfraExecutor {
  const binary = options.binary ?? "terraform";
  const env = { TF_IN_AUTOMATION: "1", ...(options.env ?? {}) };

  const tf = async (args: string[], signal?: AbortSignal) => {
    const res = await options.runner.run(binary, args, {
      cwd: options.workingDir,
      env,
      signal,
      timeoutMs: APPLY_TIMEOUT_MS,
    });
    return expectOk(`terraform ${args[0]}`, res);
  };

  return {
    workingDir: options.workingDir,

    async init(signal) {
      await tf(["init", "-input=false", "-no-color"], signal);
    },

    async plan(vars, signal) {
      await tf(["plan", "-input=false", "-no-color", `-out=${PLAN_FILE}`, ...varArgs(vars)], signal);
    },

    async apply(signal) {
      await tf(["apply", "-input=false", "-no-color", "-auto-approve", PLAN_FILE], signal);
    },

    async destroy(vars, signal) {
      await tf(["destroy", "-input=false", "-no-color", "-auto-approve", ...varArgs(vars)], signal);
    },

    async output(signal) {
      const res = await tf(["output", "-json"], signal);
      const parsed = OutputSchema.safeParse(parseJsonOutput("terraform output", res.stdout));
      if (!parsed.success) {
        throw new RemoteCallError("terraform output", { message: "unexpected output format" });
      }
      const outputs: Record<string, TerraformOutputValue> = {};
      for (const [name, entry] of Object.entries(parsed.data)) {
        outputs[name] = { value: JSON.stringify(entry.value), sensitive: entry.sensitive };
      }
      return outputs;
    },
  };
}

function varArgs(vars: TerraformVars): string[] {
  return Object.entries(vars).map(([key, value]) => `-var=${key}=${value}`);
}
