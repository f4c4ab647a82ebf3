#!/usr/bin/env node
import {
  parseArgs,
  toCreateInput,
  toDeleteInput,
  toRegionsInput,
  toUpgradeGateInput,
  toVersionsInput,
  unknownFlags,
} from "../src/cli.js";
import { loadConfig } from "../src/config.js";
import { ClusterError, ValidationError, describeError } from "../src/errors.js";
import { isCommand, showHelp } from "../src/help.js";
import { LogLevel, createLogger } from "../src/logger.js";
import { resolveCreateOptions, resolveDeleteOptions } from "../src/options.js";
import { Provider, newProvider } from "../src/provider.js";

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_USAGE = 2;

const LOG_LEVELS: LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

async function executeCommand(command: string, provider: Provider, args: Record<string, string | undefined>, signal: AbortSignal) {
  switch (command) {
    case "create": {
      const input = toCreateInput(args);
      console.error(`\n⏳ Creating cluster '${input.clusterName}'...`);
      const clusterId = await provider.createCluster(input, signal);
      console.error(`✓ Cluster '${input.clusterName}' is ready`);
      console.log(JSON.stringify({ clusterId }, null, 2));
      return EXIT_OK;
    }

    case "delete": {
      const input = toDeleteInput(args);
      console.error(`\n⏳ Deleting cluster '${input.clusterName}'...`);
      await provider.deleteCluster(input, signal);
      console.error(`✓ Cluster '${input.clusterName}' deleted`);
      return EXIT_OK;
    }

    case "versions":
      console.log(JSON.stringify(await provider.versions(toVersionsInput(args), signal), null, 2));
      return EXIT_OK;

    case "regions":
      console.log(JSON.stringify(await provider.regions(toRegionsInput(args), signal), null, 2));
      return EXIT_OK;

    case "upgrade-gate": {
      const outcome = await provider.upgradeGate(toUpgradeGateInput(args), signal);
      console.log(JSON.stringify({ outcome }, null, 2));
      return EXIT_OK;
    }

    default:
      return EXIT_USAGE;
  }
}

/** Option problems are reported before logging in anywhere. */
function checkInput(command: string, args: Record<string, string | undefined>): void {
  if (command === "create") resolveCreateOptions(toCreateInput(args));
  if (command === "delete") resolveDeleteOptions(toDeleteInput(args));
}

async function main(): Promise<number> {
  const command = process.argv[2];
  const args = parseArgs(process.argv.slice(3));

  if (!command || command === "help" || command === "-h" || command === "--help") {
    showHelp(process.argv[3]);
    return command ? EXIT_OK : EXIT_USAGE;
  }

  if (!isCommand(command)) {
    console.error(`❌ Unknown command: ${command}`);
    console.error("   Run 'rosa-cluster help' to see all commands");
    return EXIT_USAGE;
  }

  const unknown = unknownFlags(command, args);
  if (unknown.length > 0) {
    console.error(`❌ Unknown option(s) for ${command}: ${unknown.join(", ")}`);
    console.error(`   Run 'rosa-cluster help ${command}' for the supported options`);
    return EXIT_USAGE;
  }

  const config = loadConfig();
  checkInput(command, args);

  const requested = args["log-level"];
  const level = LOG_LEVELS.find((l) => l === requested) ?? config.logLevel;
  const logger = createLogger({ level });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("\n⚠️  Interrupted, stopping...");
    controller.abort();
  });
  process.once("SIGTERM", () => controller.abort());

  const provider = await newProvider(config, { logger, signal: controller.signal });
  return executeCommand(command, provider, args, controller.signal);
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof ValidationError) {
      console.error(`\n❌ ${err.message}`);
      err.violations.forEach((v) => console.error(`   - ${v}`));
      process.exit(EXIT_USAGE);
    }
    console.error(`\n❌ ${describeError(err)}`);
    if (err instanceof ClusterError && err.clusterId) {
      console.error(`   Cluster id: ${err.clusterId}`);
    }
    process.exit(EXIT_FAILED);
  });
