import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_CERT_NAME, expandHome, readConfig, resolveRunConfig, writeConfig } from "../src/config.js";
import { MemoryLogger, ScriptedPrompter } from "./helpers.js";

const HOME = "/home/operator";

describe("run config resolution", () => {
  it("uses flag values without prompting", async () => {
    const prompter = new ScriptedPrompter();
    const logger = new MemoryLogger();
    const config = await resolveRunConfig(
      {
        tenant: "acme.goskope.com",
        orgKey: "XYZ",
        certName: "bundle.pem",
        certDir: "~/certs",
        recreate: true
      },
      { prompter, logger, env: { SHELL: "/bin/bash" }, platform: "darwin", home: HOME }
    );

    expect(prompter.questions).toEqual([]);
    expect(config).toEqual({
      tenantName: "acme.goskope.com",
      orgKey: "XYZ",
      certName: "bundle.pem",
      certDir: "/home/operator/certs",
      recreateCert: true,
      debug: false,
      tenantBundle: false,
      shellProfile: "/home/operator/.bash_profile",
      platform: "darwin"
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(logger.lines).toContain("Using configured tenant name");
    expect(logger.lines).toContain("Shell used is [/bin/bash]");
  });

  it("prefers flags over env vars over stored presets", async () => {
    const config = await resolveRunConfig(
      { tenant: "flag.goskope.com" },
      {
        prompter: new ScriptedPrompter(),
        logger: new MemoryLogger(),
        env: { PROXY_CERTS_TENANT: "env.goskope.com", PROXY_CERTS_ORG_KEY: "ENVKEY", SHELL: "/bin/zsh" },
        presets: {
          tenantName: "stored.goskope.com",
          orgKey: "STOREDKEY",
          certName: "stored.pem",
          certDir: "/opt/certs"
        },
        platform: "linux",
        home: HOME
      }
    );

    expect(config.tenantName).toBe("flag.goskope.com");
    expect(config.orgKey).toBe("ENVKEY");
    expect(config.certName).toBe("stored.pem");
    expect(config.certDir).toBe("/opt/certs");
    expect(config.shellProfile).toBe("/home/operator/.zshenv");
  });

  it("prompts for missing values and repeats empty required answers", async () => {
    const prompter = new ScriptedPrompter(["", "acme.goskope.com", "XYZ", "", ""]);
    const config = await resolveRunConfig(
      {},
      { prompter, logger: new MemoryLogger(), env: {}, platform: "linux", home: HOME }
    );

    expect(prompter.questions).toEqual([
      "Please provide full tenant name (ex: mytenant.eu.goskope.com): ",
      "Please provide full tenant name (ex: mytenant.eu.goskope.com): ",
      "Please provide tenant org key: ",
      `Please provide certificate bundle name [${DEFAULT_CERT_NAME}]: `,
      "Please provide certificate bundle location [~/netskope]: "
    ]);
    expect(config.tenantName).toBe("acme.goskope.com");
    expect(config.orgKey).toBe("XYZ");
    expect(config.certName).toBe("netskope-cert-bundle.pem");
    expect(config.certDir).toBe("/home/operator/netskope");
  });

  it("asks for the org key even when the tenant is preset", async () => {
    const prompter = new ScriptedPrompter(["XYZ"]);
    const config = await resolveRunConfig(
      { tenant: "acme.goskope.com", certName: "b.pem", certDir: "/tmp/b" },
      { prompter, logger: new MemoryLogger(), env: {}, platform: "linux", home: HOME }
    );

    expect(prompter.questions).toEqual(["Please provide tenant org key: "]);
    expect(config.orgKey).toBe("XYZ");
  });

  it("fails with VALIDATION_ERROR when input ends before a tenant is given", async () => {
    await expect(
      resolveRunConfig({}, { prompter: new ScriptedPrompter([]), logger: new MemoryLogger(), env: {}, home: HOME })
    ).rejects.toMatchObject({ code: "VALIDATION_ERROR", exitCode: 1 });
  });

  it("uses the Windows defaults and skips the shell profile on win32", async () => {
    const config = await resolveRunConfig(
      { tenant: "acme.goskope.com", orgKey: "XYZ", certName: "b.pem" },
      {
        prompter: new ScriptedPrompter([""]),
        logger: new MemoryLogger(),
        env: { SHELL: "/bin/bash" },
        platform: "win32",
        home: HOME
      }
    );

    expect(config.certDir).toBe("C:\\Netskope");
    expect(config.shellProfile).toBeUndefined();
  });
});

describe("home expansion", () => {
  it("expands a leading tilde only", () => {
    expect(expandHome("~", HOME)).toBe(HOME);
    expect(expandHome("~/netskope", HOME)).toBe("/home/operator/netskope");
    expect(expandHome("/srv/~/x", HOME)).toBe("/srv/~/x");
  });
});

describe("stored presets", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("writes and reads back presets", () => {
    dir = mkdtempSync(join(tmpdir(), "proxy-certs-config-"));
    const path = join(dir, "nested", "config.json");
    writeConfig({ tenantName: "acme.goskope.com", orgKey: "XYZ" }, path);

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({ tenantName: "acme.goskope.com", orgKey: "XYZ" });
    expect(readConfig(path)).toEqual({ tenantName: "acme.goskope.com", orgKey: "XYZ" });
  });

  it("returns no presets for missing, malformed or mistyped files", () => {
    dir = mkdtempSync(join(tmpdir(), "proxy-certs-config-"));
    const broken = join(dir, "broken.json");
    const mistyped = join(dir, "mistyped.json");
    writeFileSync(broken, "{ not json");
    writeFileSync(mistyped, JSON.stringify({ tenantName: 42 }));

    expect(readConfig(join(dir, "absent.json"))).toEqual({});
    expect(readConfig(broken)).toEqual({});
    expect(readConfig(mistyped)).toEqual({});
  });
});
