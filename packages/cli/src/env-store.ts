import { appendFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import type { CommandRunner } from "./system.js";

/**
 * Persistent, user-scoped environment variables.
 *
 * Writes land where the operator's next session picks them up. The environment
 * of the running process is never modified.
 */
export interface EnvStore {
  /** Where writes are persisted, for log lines. */
  readonly target: string;
  read(name: string): string | undefined;
  write(name: string, value: string): void;
}

type Env = Record<string, string | undefined>;

/** `~/.bash_profile` for bash, `~/.zshenv` for everything else. */
export function resolveShellProfile(shell: string | undefined, home = homedir()) {
  if (shell && shell.includes("bash")) {
    return join(home, ".bash_profile");
  }
  return join(home, ".zshenv");
}

function escapeDoubleQuoted(value: string) {
  return value.replace(/[\\"$`]/g, (char) => `\\${char}`);
}

/** Value of an `export NAME=...` assignment, without quotes, a trailing `;` or a `# comment`. */
function parseAssignedValue(raw: string) {
  const value = raw.trim();
  const doubleQuoted = /^"((?:[^"\\]|\\.)*)"/.exec(value);
  if (doubleQuoted) {
    return doubleQuoted[1].replace(/\\([\\"$`])/g, "$1");
  }
  const singleQuoted = /^'([^']*)'/.exec(value);
  if (singleQuoted) {
    return singleQuoted[1];
  }
  return /^[^\s;#]*/.exec(value)?.[0] ?? "";
}

export class ShellProfileEnvStore implements EnvStore {
  constructor(
    private readonly profilePath: string,
    private readonly env: Env = process.env
  ) {}

  get target() {
    return this.profilePath;
  }

  private readProfile() {
    if (!existsSync(this.profilePath)) {
      return undefined;
    }
    return readFileSync(this.profilePath, "utf-8");
  }

  read(name: string) {
    const content = this.readProfile();
    if (content !== undefined) {
      const pattern = new RegExp(`^\\s*export\\s+${name}=(.*)$`);
      let exported: string | undefined;
      for (const line of content.split(/\r?\n/)) {
        const match = pattern.exec(line);
        if (match) {
          exported = parseAssignedValue(match[1]);
        }
      }
      if (exported !== undefined) {
        return exported;
      }
    }
    return this.env[name];
  }

  write(name: string, value: string) {
    const content = this.readProfile();
    if (content === undefined) {
      mkdirSync(dirname(this.profilePath), { recursive: true });
    }
    const separator = content && !content.endsWith("\n") ? "\n" : "";
    appendFileSync(this.profilePath, `${separator}export ${name}="${escapeDoubleQuoted(value)}"\n`);
  }
}

export class WindowsUserEnvStore implements EnvStore {
  readonly target = "HKCU\\Environment";

  constructor(
    private readonly runner: CommandRunner,
    private readonly env: Env = process.env
  ) {}

  read(name: string) {
    const query = this.runner.run("reg", ["query", this.target, "/v", name]);
    if (query.exitCode === 0) {
      const pattern = new RegExp(`^\\s*${name}\\s+REG_(?:EXPAND_)?SZ\\s+(.*)$`, "i");
      for (const line of query.stdout.split(/\r?\n/)) {
        const match = pattern.exec(line);
        if (match) {
          return match[1].trimEnd();
        }
      }
    }
    return this.env[name];
  }

  write(name: string, value: string) {
    const result = this.runner.run("setx", [name, value]);
    if (result.exitCode !== 0) {
      throw new Error(`setx ${name} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    }
  }
}
