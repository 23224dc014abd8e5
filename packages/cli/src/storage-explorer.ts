import { copyFileSync, existsSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import { homedir } from "node:os";
import type { Logger } from "./log.js";
import type { Platform } from "./schemas.js";

export interface StorageExplorerResult {
  installed: boolean;
  certDir: string;
  copiedTo?: string;
  error?: string;
}

/** Azure Storage Explorer loads every PEM file in this directory as a trusted root. */
export function storageExplorerCertDir(
  platform: Platform,
  home = homedir(),
  env: Record<string, string | undefined> = process.env
) {
  if (platform === "darwin") {
    return join(home, "Library", "Application Support", "StorageExplorer", "certs");
  }
  if (platform === "win32") {
    return join(env.APPDATA ?? join(home, "AppData", "Roaming"), "StorageExplorer", "certs");
  }
  return join(home, ".config", "StorageExplorer", "certs");
}

function isDirectory(path: string) {
  try {
    return existsSync(path) && statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function installIntoStorageExplorer(
  bundleFile: string,
  certDir: string,
  logger: Logger
): StorageExplorerResult {
  if (!isDirectory(certDir)) {
    logger.log("Azure Storage Explorer is not installed");
    return { installed: false, certDir };
  }

  logger.log("Azure Storage Explorer is installed");
  const target = join(certDir, basename(bundleFile));
  try {
    copyFileSync(bundleFile, target);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.log(`Azure Storage Explorer ERROR: ${message}`);
    return { installed: true, certDir, error: message };
  }
  logger.log(`Azure Storage Explorer configured [${target}]`);
  return { installed: true, certDir, copiedTo: target };
}
