import { BUNDLE_PLACEHOLDER, ToolRegistrySchema, type ToolSpec } from "./schemas.js";

const VERSION = ["--version"];

function post(command: string, ...args: string[]) {
  return { command, args };
}

/**
 * Tools that validate TLS on their own, in the order they are configured.
 *
 * To register another tool, add an entry with the executable to look up on
 * PATH, and either the env var it reads its CA bundle from or a command that
 * stores the path in the tool's own config (`{bundle}` is replaced with the
 * bundle path).
 */
export const TOOL_REGISTRY: readonly ToolSpec[] = Object.freeze(
  ToolRegistrySchema.parse([
    { id: "git", name: "Git", envVar: "GIT_SSL_CAPATH", checkCommand: "git", versionArgs: VERSION },
    { id: "openssl", name: "OpenSSL", envVar: "SSL_CERT_FILE", checkCommand: "openssl", versionArgs: ["version"] },
    { id: "curl", name: "cURL", envVar: "SSL_CERT_FILE", checkCommand: "curl", versionArgs: VERSION },
    {
      id: "python-requests",
      name: "Python Requests Library",
      envVar: "REQUESTS_CA_BUNDLE",
      checkCommand: "python3",
      versionArgs: VERSION
    },
    { id: "aws", name: "AWS CLI", envVar: "AWS_CA_BUNDLE", checkCommand: "aws", versionArgs: VERSION },
    {
      id: "gcloud",
      name: "Google Cloud CLI",
      checkCommand: "gcloud",
      versionArgs: VERSION,
      postCommand: post("gcloud", "config", "set", "core/custom_ca_certs_file", BUNDLE_PLACEHOLDER)
    },
    {
      id: "npm",
      name: "NodeJS Package Manager (NPM)",
      checkCommand: "npm",
      versionArgs: VERSION,
      postCommand: post("npm", "config", "set", "cafile", BUNDLE_PLACEHOLDER)
    },
    { id: "node", name: "NodeJS", envVar: "NODE_EXTRA_CA_CERTS", checkCommand: "node", versionArgs: VERSION },
    { id: "ruby", name: "Ruby", envVar: "SSL_CERT_FILE", checkCommand: "ruby", versionArgs: VERSION },
    {
      id: "composer",
      name: "PHP Composer",
      checkCommand: "composer",
      versionArgs: VERSION,
      postCommand: post("composer", "config", "--global", "cafile", BUNDLE_PLACEHOLDER)
    },
    { id: "go", name: "GoLang", envVar: "SSL_CERT_FILE", checkCommand: "go", versionArgs: ["version"] },
    { id: "azure-cli", name: "Azure CLI", envVar: "REQUESTS_CA_BUNDLE", checkCommand: "az", versionArgs: VERSION },
    { id: "pip", name: "Python PIP", envVar: "REQUESTS_CA_BUNDLE", checkCommand: "pip3", versionArgs: VERSION },
    { id: "oci", name: "Oracle Cloud CLI", envVar: "REQUESTS_CA_BUNDLE", checkCommand: "oci", versionArgs: VERSION },
    { id: "cargo", name: "Cargo Package Manager", envVar: "SSL_CERT_FILE", checkCommand: "cargo", versionArgs: VERSION },
    {
      id: "yarn",
      name: "Yarn",
      checkCommand: "yarnpkg",
      versionArgs: VERSION,
      postCommand: post("yarnpkg", "config", "set", "httpsCaFilePath", BUNDLE_PLACEHOLDER)
    }
  ])
);

export function getToolById(id: string) {
  return TOOL_REGISTRY.find((tool) => tool.id === id);
}

export function expandPostCommand(tool: ToolSpec, bundlePath: string) {
  if (!tool.postCommand) {
    return undefined;
  }
  return {
    command: tool.postCommand.command,
    args: tool.postCommand.args.map((arg) => arg.split(BUNDLE_PLACEHOLDER).join(bundlePath))
  };
}

export function describePostCommand(tool: ToolSpec, bundlePath = BUNDLE_PLACEHOLDER) {
  const expanded = expandPostCommand(tool, bundlePath);
  return expanded ? [expanded.command, ...expanded.args].join(" ") : undefined;
}
