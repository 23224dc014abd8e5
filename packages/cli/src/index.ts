#!/usr/bin/env node
import { Command } from 'commander';
import { bundlePath } from './bundle.js';
import { completionScript } from './completions.js';
import { inspectTools } from './configurator.js';
import {
  currentPlatform,
  DEFAULT_CERT_NAME,
  defaultCertDir,
  expandHome,
  getConfigPath,
  readConfig,
  resolveRunConfig,
  writeConfig,
} from './config.js';
import { CliError, errorEnvelope, exitCodeHelp } from './errors.js';
import { createInsecureTransport } from './http.js';
import { createLogger, createStderrLogger } from './log.js';
import { renderOutput, type OutputMode } from './output.js';
import { ReadlinePrompter } from './prompt.js';
import { createEnvStore, maskSecret, runSetup } from './setup.js';
import { createBinaryLocator, createCommandRunner } from './system.js';
import { TOOL_REGISTRY } from './tools.js';

interface GlobalOptions {
  json?: boolean;
  human?: boolean;
  markdown?: boolean;
}

interface SetupOptions {
  tenant?: string;
  orgKey?: string;
  certName?: string;
  certDir?: string;
  recreate?: boolean;
  debug?: boolean;
  tenantBundle?: boolean;
  shellProfile?: string;
}

function pickOutputMode(options: GlobalOptions): OutputMode {
  if (options.markdown) {
    return 'markdown';
  }
  if (options.human) {
    return 'human';
  }
  if (options.json) {
    return 'json';
  }
  if (!process.stdout.isTTY) {
    return 'json';
  }
  return 'human';
}

function printData(command: string, data: unknown, mode: OutputMode) {
  console.log(renderOutput(command, data, mode));
}

function resolveCompletionShell(input?: string) {
  const normalized = (input ?? 'zsh').toLowerCase();
  if (normalized === 'bash' || normalized === 'zsh' || normalized === 'fish') {
    return normalized;
  }
  throw new CliError('VALIDATION_ERROR', 'Shell must be one of: bash, zsh, fish', 1);
}

function completionCommands(program: Command) {
  return [
    ...new Set(
      program.commands.flatMap((registered) => [registered.name(), ...registered.aliases()]),
    ),
  ];
}

async function run() {
  const program = new Command();

  program
    .name('proxy-certs')
    .description('Build a TLS-inspection proxy certificate bundle and point local tools at it')
    .version(process.env.npm_package_version ?? '0.1.0')
    .option('--json', 'Render machine-parseable JSON output')
    .option('--human', 'Render human-readable output')
    .option('--markdown', 'Render markdown output');

  program.addHelpText(
    'after',
    '\nRunning without a command starts `setup`.\nPresets: `proxy-certs configure --tenant <host> --org-key <key>`.\nEnv overrides: `PROXY_CERTS_TENANT`, `PROXY_CERTS_ORG_KEY`, `PROXY_CERTS_CERT_NAME`, `PROXY_CERTS_CERT_DIR`.',
  );

  program
    .command('setup', { isDefault: true })
    .description('Download the certificate bundle and configure installed tools')
    .option('--tenant <host>', 'Full tenant hostname (ex: mytenant.eu.goskope.com)')
    .option('--org-key <key>', 'Tenant org key')
    .option('--cert-name <name>', `Bundle file name (default ${DEFAULT_CERT_NAME})`)
    .option('--cert-dir <dir>', 'Directory the bundle is written to')
    .option('--recreate', 'Rebuild the bundle even if it already exists')
    .option('--debug', 'Log each detected tool\'s version output')
    .option('--tenant-bundle', 'Also write a bundle holding only the tenant certificates')
    .option('--shell-profile <path>', 'Shell startup file to persist env vars in')
    .addHelpText(
      'after',
      '\nEnv vars are appended to ~/.bash_profile (bash) or ~/.zshenv (other shells), or set with setx on Windows.\nThey take effect in the next shell session.\n\n' + exitCodeHelp(),
    )
    .action(async (options: SetupOptions, command: Command) => {
      const global = command.parent?.opts<GlobalOptions>() ?? {};
      const mode = pickOutputMode(global);
      const logger = mode === 'json' ? createStderrLogger() : createLogger();
      const prompter = new ReadlinePrompter(
        process.stdin,
        mode === 'json' ? process.stderr : process.stdout,
      );

      try {
        const config = await resolveRunConfig(options, {
          prompter,
          logger,
          presets: readConfig(),
        });
        const runner = createCommandRunner();
        const summary = await runSetup(config, {
          transport: createInsecureTransport(),
          prompter,
          logger,
          locator: createBinaryLocator(),
          runner,
        });
        printData('setup', summary, mode);
      } finally {
        prompter.close();
      }
    });

  program
    .command('tools')
    .description('List the tools that get configured, in order')
    .action((_options: unknown, command: Command) => {
      const global = command.parent?.opts<GlobalOptions>() ?? {};
      printData('tools', TOOL_REGISTRY, pickOutputMode(global));
    });

  program
    .command('status')
    .description('Show which installed tools already point at the bundle')
    .option('--cert-name <name>', 'Bundle file name')
    .option('--cert-dir <dir>', 'Bundle directory')
    .option('--shell-profile <path>', 'Shell startup file to read env vars from')
    .action(
      (options: { certName?: string; certDir?: string; shellProfile?: string }, command: Command) => {
        const global = command.parent?.opts<GlobalOptions>() ?? {};
        const presets = readConfig();
        const platform = currentPlatform();
        const target = bundlePath({
          certName:
            options.certName ?? process.env.PROXY_CERTS_CERT_NAME ?? presets.certName ?? DEFAULT_CERT_NAME,
          certDir: expandHome(
            options.certDir ?? process.env.PROXY_CERTS_CERT_DIR ?? presets.certDir ?? defaultCertDir(platform),
          ),
        });
        const runner = createCommandRunner();
        const data = inspectTools(TOOL_REGISTRY, target, {
          locator: createBinaryLocator(),
          envStore: createEnvStore(
            { platform, shellProfile: options.shellProfile && expandHome(options.shellProfile) },
            runner,
          ),
        });
        printData('status', data, pickOutputMode(global));
      },
    );

  program
    .command('configure')
    .description('Store presets so later runs need no prompts')
    .option('--tenant <host>', 'Full tenant hostname')
    .option('--org-key <key>', 'Tenant org key')
    .option('--cert-name <name>', 'Bundle file name')
    .option('--cert-dir <dir>', 'Bundle directory')
    .addHelpText('after', '\nWrites presets to ~/.proxy-certs/config.json.')
    .action(
      (
        options: { tenant?: string; orgKey?: string; certName?: string; certDir?: string },
        command: Command,
      ) => {
        const global = command.parent?.opts<GlobalOptions>() ?? {};
        if (!options.tenant && !options.orgKey && !options.certName && !options.certDir) {
          throw new CliError('VALIDATION_ERROR', 'Provide at least one of --tenant, --org-key, --cert-name, --cert-dir', 1);
        }
        const current = readConfig();
        const next = {
          tenantName: options.tenant ?? current.tenantName,
          orgKey: options.orgKey ?? current.orgKey,
          certName: options.certName ?? current.certName,
          certDir: options.certDir ?? current.certDir,
        };
        writeConfig(next);
        printData(
          'configure',
          {
            path: getConfigPath(),
            tenant: next.tenantName,
            org_key: next.orgKey ? maskSecret(next.orgKey) : undefined,
            cert_name: next.certName,
            cert_dir: next.certDir,
          },
          pickOutputMode(global),
        );
      },
    );

  program
    .command('completions [shell]')
    .alias('completion')
    .description('Print a shell completion script')
    .option('--shell <shell>', 'bash|zsh|fish')
    .action((shellArg: string | undefined, options: { shell?: string }) => {
      const shell = resolveCompletionShell(options.shell ?? shellArg);
      console.log(completionScript(shell, completionCommands(program)));
    });

  await program.parseAsync(process.argv);
}

run().catch((error: unknown) => {
  if (error instanceof CliError) {
    console.error(JSON.stringify(errorEnvelope(error.code, error.message, error.details), null, 2));
    process.exit(error.exitCode);
  }

  const message = error instanceof Error ? error.message : 'Unknown CLI error';
  console.error(JSON.stringify(errorEnvelope('UNEXPECTED_ERROR', message), null, 2));
  process.exit(1);
});
