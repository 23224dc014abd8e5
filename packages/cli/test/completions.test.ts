import { describe, expect, it } from "vitest";
import { completionScript } from "../src/completions.js";

describe("shell completions", () => {
  const commands = ["setup", "tools", "status", "configure", "completions", "completion"];

  it("generates zsh completions with core commands", () => {
    const script = completionScript("zsh", commands);
    expect(script).toContain('_arguments "1:command:(completion completions configure setup status tools)"');
    expect(script).toContain('"--cert-dir"');
  });

  it("generates bash completions", () => {
    const script = completionScript("bash", commands);
    expect(script).toContain("complete -F _proxy_certs_complete proxy-certs");
    expect(script).toContain('local commands="completion completions configure setup status tools"');
    expect(script).toContain("if [[ ${words[1]} == setup ]]; then");
  });

  it("includes commands passed at runtime", () => {
    const script = completionScript("fish", [...commands, "custom-command"]);
    expect(script).toContain('complete -c proxy-certs -f -n "__fish_use_subcommand" -a "custom-command"');
    expect(script).toContain("complete -c proxy-certs -n '__fish_seen_subcommand_from setup' -l org-key");
  });
});
