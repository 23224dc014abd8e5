import { existsSync, mkdirSync, renameSync, writeFileSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { join } from "node:path";
import type { TenantClient } from "./client.js";
import { TENANT_BUNDLE_NAME } from "./config.js";
import type { Logger } from "./log.js";
import { confirm, type Prompter } from "./prompt.js";
import type { RunConfig } from "./schemas.js";

export type BundleAction = "created" | "recreated" | "kept";

export interface BundleResult {
  action: BundleAction;
  path: string;
  bytes?: number;
  tenantBundlePath?: string;
}

export interface BundleDeps {
  client: Pick<TenantClient, "download">;
  prompter: Prompter;
  logger: Logger;
}

export function bundlePath(config: Pick<RunConfig, "certDir" | "certName">) {
  return join(config.certDir, config.certName);
}

/** Replaces `path` in one rename so readers never see a half-written bundle. */
function writeWhole(path: string, content: Buffer) {
  const tmpPath = `${path}.${randomBytes(4).toString("hex")}.tmp`;
  writeFileSync(tmpPath, content);
  renameSync(tmpPath, path);
}

async function shouldBuild(config: RunConfig, path: string, deps: BundleDeps) {
  if (!existsSync(path)) {
    return true;
  }
  deps.logger.log(`[${config.certName}] already exists in [${config.certDir}]`);
  if (config.recreateCert) {
    deps.logger.log("Cert bundle already exists but certificate recreate set to [true]");
    return true;
  }
  return confirm(deps.prompter, "Recreate Certificate Bundle? (y/N) ");
}

export async function buildBundle(config: RunConfig, deps: BundleDeps): Promise<BundleResult> {
  const { client, logger } = deps;
  const path = bundlePath(config);

  if (!existsSync(config.certDir)) {
    logger.log(`[${config.certDir}] directory does not exist.`);
    logger.log(`creating directory [${config.certDir}]`);
    mkdirSync(config.certDir, { recursive: true });
  }

  const existed = existsSync(path);
  if (!(await shouldBuild(config, path, deps))) {
    logger.log("Keeping existing cert bundle");
    if (config.tenantBundle) {
      logger.log("Tenant-only cert bundle not written: the existing cert bundle was kept");
    }
    return { action: "kept", path };
  }

  logger.log("Creating cert bundle:");
  const tenantCa = await client.download("tenant-ca");
  const tenantOrg = await client.download("tenant-org");
  const mozillaRoots = await client.download("mozilla-roots");

  const content = Buffer.concat([tenantCa.body, tenantOrg.body, mozillaRoots.body]);
  writeWhole(path, content);
  logger.log(`Cert bundle written to [${path}]`);

  let tenantBundlePath: string | undefined;
  if (config.tenantBundle) {
    tenantBundlePath = join(config.certDir, TENANT_BUNDLE_NAME);
    writeWhole(tenantBundlePath, Buffer.concat([tenantCa.body, tenantOrg.body]));
    logger.log(`Tenant-only cert bundle written to [${tenantBundlePath}]`);
  }

  return {
    action: existed ? "recreated" : "created",
    path,
    bytes: content.length,
    tenantBundlePath
  };
}
