/**
 * Shell completion and markdown reference, both generated from the
 * registered command tree.
 */

import { Command } from "commander";
import { action, requireChoice } from "../lib/command.js";

export const SHELLS = ["bash", "zsh", "fish"] as const;
export type Shell = (typeof SHELLS)[number];

export interface OptionInfo {
  flags: string;
  long?: string;
  description: string;
  defaultValue?: string;
}

export interface CommandInfo {
  /** Words after the program name, e.g. ["auth", "login"] */
  path: string[];
  description: string;
  usage: string;
  subcommands: string[];
  options: OptionInfo[];
}

function describeDefault(value: unknown): string | undefined {
  if (value === undefined || value === false) return undefined;
  return typeof value === "string" ? `"${value}"` : String(value);
}

/**
 * Flatten the command tree, parents before children.
 */
export function collectCommands(program: Command): CommandInfo[] {
  const result: CommandInfo[] = [];
  const visit = (cmd: Command, path: string[]) => {
    result.push({
      path,
      description: cmd.description(),
      usage: cmd.usage(),
      subcommands: cmd.commands.map((c) => c.name()),
      options: cmd.options
        .filter((o) => !o.hidden)
        .map((o) => ({
          flags: o.flags,
          long: o.long,
          description: o.description,
          defaultValue: describeDefault(o.defaultValue),
        })),
    });
    for (const child of cmd.commands) {
      visit(child, [...path, child.name()]);
    }
  };
  visit(program, []);
  return result;
}

function words(info: CommandInfo): string[] {
  return [...info.subcommands, ...info.options.flatMap((o) => (o.long ? [o.long] : []))];
}

function renderBash(name: string, commands: CommandInfo[]): string {
  const fn = `_${name.replace(/[^A-Za-z0-9]/g, "_")}`;
  const cases = commands
    .map((info) => `    "${info.path.join(" ")}") opts="${words(info).join(" ")}" ;;`)
    .join("\n");
  return `# bash completion for ${name}
${fn}() {
  local cur="\${COMP_WORDS[COMP_CWORD]}"
  local cmd_path="" opts="" i
  for ((i = 1; i < COMP_CWORD; i++)); do
    [[ "\${COMP_WORDS[i]}" == -* ]] && continue
    cmd_path="\${cmd_path:+\$cmd_path }\${COMP_WORDS[i]}"
  done
  case "\$cmd_path" in
${cases}
  esac
  COMPREPLY=( $(compgen -W "\$opts" -- "\$cur") )
}
complete -F ${fn} ${name}
`;
}

function renderZsh(name: string, commands: CommandInfo[]): string {
  return `#compdef ${name}
autoload -U +X bashcompinit && bashcompinit
${renderBash(name, commands)}`;
}

function fishEscape(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

function renderFish(name: string, commands: CommandInfo[]): string {
  const fn = `__${name.replace(/[^A-Za-z0-9]/g, "_")}_path`;
  const lines = [
    `# fish completion for ${name}`,
    `function ${fn}`,
    "    set -l words (commandline -opc)",
    "    set -e words[1]",
    "    string join ' ' -- (string match -v -- '-*' $words)",
    "end",
  ];
  const byPath = new Map(commands.map((info) => [info.path.join(" "), info]));
  for (const info of commands) {
    const condition = `-n 'test "(${fn})" = "${fishEscape(info.path.join(" "))}"'`;
    for (const sub of info.subcommands) {
      const child = byPath.get([...info.path, sub].join(" "));
      lines.push(
        `complete -c ${name} -f ${condition} -a '${fishEscape(sub)}' -d '${fishEscape(child?.description ?? "")}'`
      );
    }
    for (const option of info.options) {
      if (!option.long) continue;
      lines.push(
        `complete -c ${name} -f ${condition} -l '${fishEscape(option.long.replace(/^--/, ""))}' -d '${fishEscape(option.description)}'`
      );
    }
  }
  return `${lines.join("\n")}\n`;
}

export function renderCompletion(shell: Shell, program: Command): string {
  const commands = collectCommands(program);
  const name = program.name();
  switch (shell) {
    case "bash":
      return renderBash(name, commands);
    case "zsh":
      return renderZsh(name, commands);
    case "fish":
      return renderFish(name, commands);
  }
}

function tableCell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

/**
 * Markdown reference for every command, one heading per command.
 */
export function renderDocs(program: Command): string {
  const name = program.name();
  const out: string[] = [];
  for (const info of collectCommands(program)) {
    const title = [name, ...info.path].join(" ");
    out.push(`${"#".repeat(Math.min(info.path.length + 1, 6))} ${title}`, "");
    if (info.description) {
      out.push(info.description, "");
    }
    out.push("```", `${title} ${info.usage}`.trimEnd(), "```", "");
    if (info.options.length > 0) {
      out.push("| Option | Description |", "| --- | --- |");
      for (const option of info.options) {
        const description = option.defaultValue
          ? `${option.description} (default: ${option.defaultValue})`
          : option.description;
        out.push(`| \`${tableCell(option.flags)}\` | ${tableCell(description)} |`);
      }
      out.push("");
    }
  }
  return out.join("\n");
}

export function registerCompletionCommands(program: Command): void {
  program
    .command("completion")
    .description("Print a shell completion script")
    .argument("<shell>", `one of: ${SHELLS.join(", ")}`)
    .addHelpText(
      "after",
      `
Examples:
  gplay completion bash > /etc/bash_completion.d/gplay
  gplay completion zsh > "\${fpath[1]}/_gplay"
  gplay completion fish > ~/.config/fish/completions/gplay.fish
`
    )
    .action(
      action(async (shell: string) => {
        const choice = requireChoice(shell.trim().toLowerCase(), "<shell>", SHELLS);
        process.stdout.write(renderCompletion(choice, program));
      })
    );

  program
    .command("docs")
    .description("Print the command reference as markdown")
    .action(() => {
      process.stdout.write(renderDocs(program));
    });
}
