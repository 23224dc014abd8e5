export type CompletionShell = "bash" | "zsh" | "fish";

const SETUP_FLAGS = [
  "--tenant",
  "--org-key",
  "--cert-name",
  "--cert-dir",
  "--recreate",
  "--debug",
  "--tenant-bundle",
  "--shell-profile"
];

function normalizedCommandList(commands: string[]) {
  return [...new Set(commands.map((command) => command.trim()).filter(Boolean))]
    .sort((a, b) => a.localeCompare(b));
}

function bashCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return `# proxy-certs bash completion
_proxy_certs_complete() {
  local cur prev words cword
  _init_completion || return
  local commands="${commandList.join(" ")}"

  if [[ $cword -eq 1 ]]; then
    COMPREPLY=( $(compgen -W "$commands" -- "$cur") )
    return
  fi

  case "$prev" in
    --cert-dir|--shell-profile)
      _filedir
      return
      ;;
    completions)
      COMPREPLY=( $(compgen -W "bash zsh fish" -- "$cur") )
      return
      ;;
  esac

  if [[ \${words[1]} == setup ]]; then
    COMPREPLY=( $(compgen -W "${SETUP_FLAGS.join(" ")}" -- "$cur") )
  fi
}
complete -F _proxy_certs_complete proxy-certs
`;
}

function zshCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return `#compdef proxy-certs
_proxy_certs() {
  _arguments "1:command:(${commandList.join(" ")})" "*::arg:->args"

  case $state in
    args)
      case $words[1] in
        setup)
          _arguments ${SETUP_FLAGS.map((flag) => `"${flag}"`).join(" ")}
          ;;
        completions)
          _arguments "1:shell:(bash zsh fish)"
          ;;
      esac
      ;;
  esac
}
_proxy_certs "$@"
`;
}

function fishCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return commandList
    .map((command) => `complete -c proxy-certs -f -n "__fish_use_subcommand" -a "${command}"`)
    .concat(
      SETUP_FLAGS.map(
        (flag) => `complete -c proxy-certs -n '__fish_seen_subcommand_from setup' -l ${flag.slice(2)}`
      )
    )
    .join("\n");
}

export function completionScript(shell: CompletionShell, commands: string[]) {
  if (shell === "bash") {
    return bashCompletion(commands);
  }
  if (shell === "zsh") {
    return zshCompletion(commands);
  }
  return fishCompletion(commands);
}
