import { spawnSync } from "node:child_process";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[]): CommandResult;
}

export interface BinaryLocator {
  exists(binary: string): boolean;
}

function quoteForCmd(arg: string) {
  return /[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg;
}

export function createCommandRunner(platform: NodeJS.Platform = process.platform): CommandRunner {
  return {
    run(command, args) {
      // npm, yarnpkg and gcloud are .cmd shims on Windows and need a shell to launch.
      const shell = platform === "win32";
      const result = spawnSync(command, shell ? args.map(quoteForCmd) : args, {
        encoding: "utf-8",
        shell
      });
      if (result.error) {
        return { exitCode: -1, stdout: "", stderr: result.error.message };
      }
      return {
        exitCode: result.status ?? -1,
        stdout: result.stdout ?? "",
        stderr: result.stderr ?? ""
      };
    }
  };
}

export function createBinaryLocator(platform: NodeJS.Platform = process.platform): BinaryLocator {
  const locator = platform === "win32" ? "where" : "which";
  return {
    exists(binary) {
      const lookup = spawnSync(locator, [binary], { stdio: "ignore" });
      return lookup.status === 0;
    }
  };
}
