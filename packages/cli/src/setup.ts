import { buildBundle, type BundleResult } from "./bundle.js";
import { TenantClient } from "./client.js";
import { configureTools, type ToolOutcome } from "./configurator.js";
import { resolveShellProfile, ShellProfileEnvStore, WindowsUserEnvStore, type EnvStore } from "./env-store.js";
import type { HttpTransport } from "./http.js";
import type { Logger } from "./log.js";
import type { Prompter } from "./prompt.js";
import type { RunConfig, ToolSpec } from "./schemas.js";
import {
  installIntoStorageExplorer,
  storageExplorerCertDir,
  type StorageExplorerResult
} from "./storage-explorer.js";
import type { BinaryLocator, CommandRunner } from "./system.js";
import { TOOL_REGISTRY } from "./tools.js";

export interface SetupDeps {
  transport: HttpTransport;
  prompter: Prompter;
  logger: Logger;
  locator: BinaryLocator;
  runner: CommandRunner;
  envStore?: EnvStore;
  registry?: readonly ToolSpec[];
  storageExplorerDir?: string;
}

export interface SetupSummary {
  tenant: string;
  reachability_status: number;
  bundle: BundleResult;
  tools: ToolOutcome[];
  storage_explorer: StorageExplorerResult;
}

export function maskSecret(value: string) {
  if (value.length <= 4) {
    return "****";
  }
  return `${value.slice(0, 2)}${"*".repeat(value.length - 4)}${value.slice(-2)}`;
}

export function createEnvStore(
  config: Pick<RunConfig, "platform" | "shellProfile">,
  runner: CommandRunner
): EnvStore {
  if (config.platform === "win32") {
    return new WindowsUserEnvStore(runner);
  }
  return new ShellProfileEnvStore(config.shellProfile ?? resolveShellProfile(process.env.SHELL));
}

export async function runSetup(config: RunConfig, deps: SetupDeps): Promise<SetupSummary> {
  const { logger } = deps;

  logger.log("Starting a new SSL cert bundle run");
  logger.log(`tenant_name: [${config.tenantName}]`);
  logger.log(`org_key: [${maskSecret(config.orgKey)}]`);
  logger.log(`cert_name: [${config.certName}]`);
  logger.log(`cert_dir: [${config.certDir}]`);
  logger.log(`recreate_cert: [${config.recreateCert}]`);

  const client = new TenantClient(config.tenantName, config.orgKey, deps.transport);

  logger.log(`Testing if tenant [${config.tenantName}] is reachable`);
  let status: number;
  try {
    status = await client.assertReachable();
  } catch (error) {
    logger.log("ERROR: Tenant Unreachable");
    throw error;
  }
  logger.log("Tenant Reachable");

  const bundle = await buildBundle(config, { client, prompter: deps.prompter, logger });

  const tools = configureTools(deps.registry ?? TOOL_REGISTRY, bundle.path, {
    locator: deps.locator,
    runner: deps.runner,
    envStore: deps.envStore ?? createEnvStore(config, deps.runner),
    logger,
    debug: config.debug
  });

  const storageExplorer = installIntoStorageExplorer(
    bundle.path,
    deps.storageExplorerDir ?? storageExplorerCertDir(config.platform),
    logger
  );

  logger.log("SSL cert bundle run finished successfully");
  if (tools.some((tool) => tool.status === "configured")) {
    logger.log("Open a new shell session to pick up the updated environment variables");
  }

  return {
    tenant: config.tenantName,
    reachability_status: status,
    bundle,
    tools,
    storage_explorer: storageExplorer
  };
}
