import { describe, expect, it } from "vitest";
import { ToolSpecSchema } from "../src/schemas.js";
import { describePostCommand, expandPostCommand, getToolById, TOOL_REGISTRY } from "../src/tools.js";

describe("tool registry", () => {
  it("keeps the configuration order", () => {
    expect(TOOL_REGISTRY.map((tool) => tool.name)).toEqual([
      "Git",
      "OpenSSL",
      "cURL",
      "Python Requests Library",
      "AWS CLI",
      "Google Cloud CLI",
      "NodeJS Package Manager (NPM)",
      "NodeJS",
      "Ruby",
      "PHP Composer",
      "GoLang",
      "Azure CLI",
      "Python PIP",
      "Oracle Cloud CLI",
      "Cargo Package Manager",
      "Yarn"
    ]);
    expect(Object.isFrozen(TOOL_REGISTRY)).toBe(true);
  });

  it("maps each tool to the env var it reads", () => {
    expect(Object.fromEntries(TOOL_REGISTRY.filter((tool) => tool.envVar).map((tool) => [tool.id, tool.envVar]))).toEqual({
      git: "GIT_SSL_CAPATH",
      openssl: "SSL_CERT_FILE",
      curl: "SSL_CERT_FILE",
      "python-requests": "REQUESTS_CA_BUNDLE",
      aws: "AWS_CA_BUNDLE",
      node: "NODE_EXTRA_CA_CERTS",
      ruby: "SSL_CERT_FILE",
      go: "SSL_CERT_FILE",
      "azure-cli": "REQUESTS_CA_BUNDLE",
      pip: "REQUESTS_CA_BUNDLE",
      oci: "REQUESTS_CA_BUNDLE",
      cargo: "SSL_CERT_FILE"
    });
  });

  it("renders the native config commands", () => {
    const commands = TOOL_REGISTRY.map((tool) => describePostCommand(tool, "/certs/b.pem")).filter(Boolean);
    expect(commands).toEqual([
      "gcloud config set core/custom_ca_certs_file /certs/b.pem",
      "npm config set cafile /certs/b.pem",
      "composer config --global cafile /certs/b.pem",
      "yarnpkg config set httpsCaFilePath /certs/b.pem"
    ]);
  });

  it("keeps a bundle path with spaces as one argument", () => {
    const composer = getToolById("composer");
    expect(composer && expandPostCommand(composer, "/Users/a b/bundle.pem")).toEqual({
      command: "composer",
      args: ["config", "--global", "cafile", "/Users/a b/bundle.pem"]
    });
    const git = getToolById("git");
    expect(git && expandPostCommand(git, "/x.pem")).toBeUndefined();
  });

  it("rejects entries with unsafe executables", () => {
    const result = ToolSpecSchema.safeParse({
      id: "bad",
      name: "Bad",
      checkCommand: "rm -rf /",
      versionArgs: ["--version"]
    });
    expect(result.success).toBe(false);
  });
});
