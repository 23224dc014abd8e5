import type { ToolInspection, ToolOutcome } from './configurator.js';
import type { SetupSummary } from './setup.js';
import type { ToolSpec } from './schemas.js';
import { describePostCommand } from './tools.js';

export type OutputMode = 'json' | 'human' | 'markdown';
const OUTPUT_SCHEMA_VERSION = '1.0.0';

function bulletList(items: string[]) {
  return items.map((item) => `- ${item}`).join('\n');
}

export function renderOutput(command: string, data: unknown, mode: OutputMode) {
  if (mode === 'json') {
    return JSON.stringify(
      {
        ok: true,
        schema_version: OUTPUT_SCHEMA_VERSION,
        command,
        data,
      },
      null,
      2,
    );
  }

  if (mode === 'markdown') {
    return renderMarkdown(command, data);
  }

  return renderHuman(command, data);
}

function isSetupSummary(data: unknown): data is SetupSummary {
  return typeof data === 'object' && data !== null && 'bundle' in data && 'tools' in data;
}

function isToolSpecList(data: unknown): data is ToolSpec[] {
  return Array.isArray(data) && data.every((entry) => typeof entry === 'object' && entry !== null && 'checkCommand' in entry);
}

function isInspectionList(data: unknown): data is ToolInspection[] {
  return Array.isArray(data) && data.every((entry) => typeof entry === 'object' && entry !== null && 'state' in entry);
}

function outcomeLabel(outcome: ToolOutcome) {
  const parts: string[] = [outcome.status];
  if (outcome.envVar && outcome.status !== 'not-installed') {
    parts.push(outcome.envVar);
  }
  if (outcome.postCommand) {
    parts.push(`post command exit ${outcome.postCommand.exitCode}`);
  }
  if (outcome.error) {
    parts.push(outcome.error);
  }
  return parts.join(' · ');
}

function renderHuman(command: string, data: unknown): string {
  if (command === 'setup' && isSetupSummary(data)) {
    return renderSetupHuman(data);
  }

  if (command === 'tools' && isToolSpecList(data)) {
    return data
      .map((tool, index) =>
        [
          `${index + 1}. ${tool.name} (${tool.id})`,
          `detect: ${tool.checkCommand} | env: ${tool.envVar ?? '--'}`,
          describePostCommand(tool) ? `post: ${describePostCommand(tool)}` : '',
        ]
          .filter(Boolean)
          .join('\n'),
      )
      .join('\n\n');
  }

  if (command === 'status' && isInspectionList(data)) {
    if (data.length === 0) {
      return 'No results.';
    }
    return data
      .map((entry) => {
        const current = entry.envVar ? ` | ${entry.envVar}=${entry.currentValue ?? '(unset)'}` : '';
        return `${entry.name}: ${entry.state}${current}`;
      })
      .join('\n');
  }

  if (typeof data === 'object' && data !== null) {
    return Object.entries(data)
      .map(([key, value]) => `${key}: ${JSON.stringify(value)}`)
      .join('\n');
  }

  return String(data);
}

function renderMarkdown(command: string, data: unknown): string {
  if (command === 'setup' && isSetupSummary(data)) {
    return renderSetupMarkdown(data);
  }

  if (command === 'tools' && isToolSpecList(data)) {
    const rows = data.map(
      (tool) =>
        `| ${tool.name} | \`${tool.checkCommand}\` | ${tool.envVar ? `\`${tool.envVar}\`` : ''} | ${
          describePostCommand(tool) ? `\`${describePostCommand(tool)}\`` : ''
        } |`,
    );
    return ['## tools', '', '| Tool | Detect | Env var | Post command |', '|---|---|---|---|', ...rows].join('\n');
  }

  if (command === 'status' && isInspectionList(data)) {
    return `## status\n\n${bulletList(data.map((entry) => `**${entry.name}**: ${entry.state}`))}`;
  }

  if (typeof data === 'object' && data !== null) {
    return `## ${command}\n\n${bulletList(
      Object.entries(data).map(([key, value]) => `**${key}**: ${JSON.stringify(value)}`),
    )}`;
  }

  return `## ${command}\n\n${String(data)}`;
}

function renderSetupHuman(summary: SetupSummary) {
  const present = summary.tools.filter((tool) => tool.status !== 'not-installed');
  const missing = summary.tools.length - present.length;
  const header = [`tenant: ${summary.tenant}`, `bundle: ${summary.bundle.path} (${summary.bundle.action})`];
  if (summary.bundle.tenantBundlePath) {
    header.push(`tenant bundle: ${summary.bundle.tenantBundlePath}`);
  }
  return [
    ...header,
    '',
    ...present.map((tool) => `${tool.name}: ${outcomeLabel(tool)}`),
    `${missing} tool(s) not installed`,
    `Azure Storage Explorer: ${explorerLabel(summary)}`,
  ].join('\n');
}

function explorerLabel(summary: SetupSummary) {
  const explorer = summary.storage_explorer;
  if (!explorer.installed) {
    return 'not installed';
  }
  return explorer.error ? `failed (${explorer.error})` : 'configured';
}

function renderSetupMarkdown(summary: SetupSummary) {
  const rows = summary.tools.map((tool) => `| ${tool.name} | ${outcomeLabel(tool)} |`);
  return [
    '## setup',
    '',
    `- **Tenant**: ${summary.tenant}`,
    `- **Bundle**: \`${summary.bundle.path}\` (${summary.bundle.action})`,
    ...(summary.bundle.tenantBundlePath ? [`- **Tenant bundle**: \`${summary.bundle.tenantBundlePath}\``] : []),
    `- **Azure Storage Explorer**: ${explorerLabel(summary)}`,
    '',
    '| Tool | Result |',
    '|---|---|',
    ...rows,
  ].join('\n');
}
