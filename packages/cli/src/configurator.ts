import type { EnvStore } from "./env-store.js";
import type { Logger } from "./log.js";
import type { ToolSpec } from "./schemas.js";
import type { BinaryLocator, CommandRunner } from "./system.js";
import { expandPostCommand } from "./tools.js";

export type ToolStatus = "not-installed" | "already-configured" | "configured" | "no-env-var" | "failed";

export interface PostCommandOutcome {
  command: string;
  exitCode: number;
}

export interface ToolOutcome {
  id: string;
  name: string;
  status: ToolStatus;
  envVar?: string;
  error?: string;
  postCommand?: PostCommandOutcome;
}

export interface ConfiguratorDeps {
  locator: BinaryLocator;
  runner: CommandRunner;
  envStore: EnvStore;
  logger: Logger;
  debug?: boolean;
}

function logOutput(logger: Logger, prefix: string, output: string) {
  for (const line of output.split(/\r?\n/)) {
    if (line.trim()) {
      logger.log(`${prefix} ${line}`);
    }
  }
}

export function configureTool(tool: ToolSpec, bundlePath: string, deps: ConfiguratorDeps): ToolOutcome {
  const { logger } = deps;
  const tag = `[${tool.name}]`;

  logger.log(`${tag} checking if tool is installed`);
  if (!deps.locator.exists(tool.checkCommand)) {
    logger.log(`${tag} is not installed`);
    return { id: tool.id, name: tool.name, status: "not-installed", envVar: tool.envVar };
  }
  logger.log(`${tag} tool is installed`);

  if (deps.debug) {
    const version = deps.runner.run(tool.checkCommand, [...tool.versionArgs]);
    logOutput(logger, tag, version.stdout || version.stderr);
  }

  const outcome: ToolOutcome = { id: tool.id, name: tool.name, status: "no-env-var", envVar: tool.envVar };

  if (tool.envVar) {
    if (deps.envStore.read(tool.envVar) === bundlePath) {
      logger.log(`${tag} already configured, skipping ..`);
      outcome.status = "already-configured";
    } else {
      logger.log(`${tag} Configuring tool`);
      try {
        deps.envStore.write(tool.envVar, bundlePath);
        logger.log(`${tag} ${tool.envVar} written to [${deps.envStore.target}]`);
        outcome.status = "configured";
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.log(`${tag} ERROR: ${message}`);
        outcome.status = "failed";
        outcome.error = message;
      }
    }
  }

  const post = expandPostCommand(tool, bundlePath);
  if (post) {
    const display = [post.command, ...post.args].join(" ");
    logger.log(`${tag} Running post command: [${display}]`);
    const result = deps.runner.run(post.command, post.args);
    logOutput(logger, tag, `${result.stdout}\n${result.stderr}`);
    outcome.postCommand = { command: display, exitCode: result.exitCode };
  }

  return outcome;
}

/** Configures every tool in order; a failure on one tool never stops the rest. */
export function configureTools(
  registry: readonly ToolSpec[],
  bundlePath: string,
  deps: ConfiguratorDeps
): ToolOutcome[] {
  return registry.map((tool) => configureTool(tool, bundlePath, deps));
}

export type ToolState = "not-installed" | "configured" | "pending";

export interface ToolInspection {
  id: string;
  name: string;
  state: ToolState;
  envVar?: string;
  currentValue?: string;
  postCommand?: string;
}

/**
 * Reports what `configureTools` would do without running anything but the
 * PATH lookup and env reads. Tools configured only through a post command
 * are always `pending`, since their native config is not read back.
 */
export function inspectTools(
  registry: readonly ToolSpec[],
  bundlePath: string,
  deps: Pick<ConfiguratorDeps, "locator" | "envStore">
): ToolInspection[] {
  return registry.map((tool) => {
    const post = expandPostCommand(tool, bundlePath);
    const postCommand = post ? [post.command, ...post.args].join(" ") : undefined;
    if (!deps.locator.exists(tool.checkCommand)) {
      return { id: tool.id, name: tool.name, state: "not-installed", envVar: tool.envVar, postCommand };
    }
    const currentValue = tool.envVar ? deps.envStore.read(tool.envVar) : undefined;
    const state: ToolState =
      tool.envVar && currentValue === bundlePath && !post ? "configured" : "pending";
    return { id: tool.id, name: tool.name, state, envVar: tool.envVar, currentValue, postCommand };
  });
}
