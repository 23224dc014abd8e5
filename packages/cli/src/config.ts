import { chmodSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { resolveShellProfile } from "./env-store.js";
import { CliError } from "./errors.js";
import type { Logger } from "./log.js";
import { askRequired, askWithDefault, type Prompter } from "./prompt.js";
import {
  RunConfigSchema,
  StoredPresetsSchema,
  type Platform,
  type RunConfig,
  type StoredPresets
} from "./schemas.js";

export const DEFAULT_CERT_NAME = "netskope-cert-bundle.pem";
export const TENANT_BUNDLE_NAME = "netskope-tenant-bundle.pem";

const CONFIG_PATH = join(homedir(), ".proxy-certs", "config.json");

export interface RunOverrides {
  tenant?: string;
  orgKey?: string;
  certName?: string;
  certDir?: string;
  recreate?: boolean;
  debug?: boolean;
  tenantBundle?: boolean;
  shellProfile?: string;
}

export interface ResolveDeps {
  prompter: Prompter;
  logger: Logger;
  presets?: StoredPresets;
  env?: Record<string, string | undefined>;
  platform?: Platform;
  home?: string;
}

function normalize(value?: string) {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function getConfigPath() {
  return CONFIG_PATH;
}

export function readConfig(path = CONFIG_PATH): StoredPresets {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    return {};
  }
  const parsed = StoredPresetsSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

export function writeConfig(config: StoredPresets, path = CONFIG_PATH) {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  try {
    chmodSync(dir, 0o700);
  } catch {
    // Best-effort on platforms that don't support chmod.
  }
  writeFileSync(path, JSON.stringify(config, null, 2));
  try {
    chmodSync(path, 0o600);
  } catch {
    // Best-effort on platforms that don't support chmod.
  }
}

export function currentPlatform(): Platform {
  const platform = process.platform;
  if (platform === "darwin" || platform === "win32") {
    return platform;
  }
  return "linux";
}

export function defaultCertDir(platform: Platform) {
  return platform === "win32" ? "C:\\Netskope" : "~/netskope";
}

export function expandHome(path: string, home = homedir()) {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(home, path.slice(2));
  }
  return path;
}

export async function resolveRunConfig(overrides: RunOverrides, deps: ResolveDeps): Promise<RunConfig> {
  const { prompter, logger } = deps;
  const env = deps.env ?? process.env;
  const presets = deps.presets ?? {};
  const platform = deps.platform ?? currentPlatform();
  const home = deps.home ?? homedir();

  const preset = (flag: string | undefined, envName: string, stored: string | undefined) =>
    normalize(flag) ?? normalize(env[envName]) ?? normalize(stored);

  let tenantName = preset(overrides.tenant, "PROXY_CERTS_TENANT", presets.tenantName);
  if (tenantName) {
    logger.log("Using configured tenant name");
  } else {
    logger.log("Tenant name not provided.");
    tenantName = await askRequired(prompter, "Please provide full tenant name (ex: mytenant.eu.goskope.com): ");
  }

  let orgKey = preset(overrides.orgKey, "PROXY_CERTS_ORG_KEY", presets.orgKey);
  if (orgKey) {
    logger.log("Using configured org key");
  } else {
    logger.log("Org key not provided.");
    orgKey = await askRequired(prompter, "Please provide tenant org key: ");
  }

  if (!tenantName || !orgKey) {
    throw new CliError("VALIDATION_ERROR", "Tenant name and org key are required", 1, {
      missing: [!tenantName && "tenant", !orgKey && "org_key"].filter(Boolean)
    });
  }

  let certName = preset(overrides.certName, "PROXY_CERTS_CERT_NAME", presets.certName);
  if (certName) {
    logger.log("Using configured cert name");
  } else {
    certName = await askWithDefault(
      prompter,
      `Please provide certificate bundle name [${DEFAULT_CERT_NAME}]: `,
      DEFAULT_CERT_NAME
    );
  }

  let certDir = preset(overrides.certDir, "PROXY_CERTS_CERT_DIR", presets.certDir);
  if (certDir) {
    logger.log("Using configured cert dir");
  } else {
    const fallback = defaultCertDir(platform);
    certDir = await askWithDefault(prompter, `Please provide certificate bundle location [${fallback}]: `, fallback);
  }

  let shellProfile = normalize(overrides.shellProfile);
  if (!shellProfile && platform !== "win32") {
    logger.log(`Shell used is [${env.SHELL ?? "unknown"}]`);
    shellProfile = resolveShellProfile(env.SHELL, home);
  }

  const parsed = RunConfigSchema.safeParse({
    tenantName,
    orgKey,
    certName,
    certDir: expandHome(certDir, home),
    recreateCert: overrides.recreate ?? false,
    debug: overrides.debug ?? false,
    tenantBundle: overrides.tenantBundle ?? false,
    shellProfile: shellProfile && expandHome(shellProfile, home),
    platform
  });
  if (!parsed.success) {
    throw new CliError("VALIDATION_ERROR", "Invalid run configuration", 1, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }
  return Object.freeze(parsed.data);
}
