import { Command, Help } from "commander";
import { createRequire } from "node:module";
import { text } from "@wtt/design-system";
import {
  createCliContainer,
  type CliContainer,
  type CliDependencies
} from "./container.js";
import { registerSetupCommand } from "./commands/setup.js";
import { registerTeardownCommand } from "./commands/teardown.js";
import { registerAddCommand } from "./commands/add.js";
import { registerListCommand } from "./commands/list.js";
import { registerRemoveCommand } from "./commands/remove.js";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const TAGLINE = "Manage git worktrees on top of bare clones.";

function readVersion(manifest: unknown): string {
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}

function formatHelpText(): string {
  const commandWidth = 10;
  const cmd = (name: string, args: string) => {
    const padded = name.padEnd(commandWidth);
    const argument = args ? ` ${text.argument(args)}` : "";
    return `  ${text.command(padded)}${argument}`;
  };
  const describe = (line: string, args: string, description: string) =>
    `${line}${" ".repeat(Math.max(2, 30 - args.length))}${description}`;
  const example = (value: string) =>
    `                                 ${text.example(value)}`;
  const opt = (flag: string, desc: string) =>
    `  ${text.option(flag.padEnd(31))}${desc}`;

  const entry = (name: string, args: string, description: string) =>
    describe(cmd(name, args), args, description);

  return [
    text.heading(TAGLINE),
    "",
    `${text.section("Usage:")} ${text.usageCommand("wtt")} ${text.argument("<command> [...options]")}`,
    "",
    text.section("Commands:"),
    entry("setup", "<url>", "Create a bare clone and its worktree directory"),
    example("wtt setup git@example.com:team/myrepo.git"),
    "",
    entry("teardown", "<repo>", "Remove a repository's worktrees and bare clone"),
    example("wtt teardown myrepo"),
    "",
    entry("add", "<branch>", "Create a worktree for a branch"),
    example("wtt add feature/login --base origin/main"),
    "",
    entry("list", "", "List worktrees"),
    example("wtt list --repo myrepo"),
    "",
    entry("remove", "<branch>", "Remove the worktree for a branch"),
    example("wtt remove feature/login"),
    "",
    text.section("Options:"),
    opt("--config-file <path>", "Read settings from this TOML file"),
    opt("--no-config-file", "Ignore the configuration file"),
    opt("--bare-clone-dir <path>", "Directory holding bare clones"),
    opt("--worktree-dir <path>", "Directory holding worktrees"),
    opt("--verbose", "Show verbose logs and git invocations"),
    opt("-V, --version", "Output the version number"),
    opt("-h, --help", "Display help for command"),
    "",
    opt("<command> --help", "Print help text for command")
  ].join("\n");
}

function formatSubcommandHelp(cmd: Command, helper: Help): string {
  const termWidth = helper.padWidth(cmd, helper);
  const padWidth = termWidth + 2;
  const indent = "  ";

  const formatItem = (
    term: string,
    description: string,
    style: (value: string) => string
  ): string => {
    if (!description) {
      return style(term);
    }
    const padding = " ".repeat(Math.max(0, padWidth - term.length));
    return `${style(term)}${padding}${description}`;
  };

  const formatList = (items: string[]): string =>
    items.map((item) => `${indent}${item}`).join("\n");

  const output: string[] = [];
  output.push(text.heading(`wtt - ${cmd.name()}`), "");
  output.push(
    `${text.section("Usage:")} ${text.usageCommand(helper.commandUsage(cmd))}`,
    ""
  );

  const commandDescription = helper.commandDescription(cmd);
  if (commandDescription.length > 0) {
    output.push(commandDescription, "");
  }

  const argumentList = helper.visibleArguments(cmd).map((argument) =>
    formatItem(
      helper.argumentTerm(argument),
      helper.argumentDescription(argument),
      text.argument
    )
  );
  if (argumentList.length > 0) {
    output.push(text.section("Arguments:"), formatList(argumentList), "");
  }

  const optionList = helper.visibleOptions(cmd).map((option) =>
    formatItem(
      helper.optionTerm(option),
      helper.optionDescription(option),
      text.option
    )
  );
  if (optionList.length > 0) {
    output.push(text.section("Options:"), formatList(optionList), "");
  }

  const globalOptionList = helper.visibleGlobalOptions(cmd).map((option) =>
    formatItem(
      helper.optionTerm(option),
      helper.optionDescription(option),
      text.option
    )
  );
  if (globalOptionList.length > 0) {
    output.push(text.section("Global Options:"), formatList(globalOptionList), "");
  }

  return output.join("\n");
}

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = bootstrapProgram(container);

  if (dependencies.exitOverride ?? true) {
    applyExitOverride(program);
  }

  if (dependencies.suppressCommanderOutput) {
    suppressCommanderOutput(program);
  }

  return program;
}

function bootstrapProgram(container: CliContainer): Command {
  const program = new Command();
  program
    .name("wtt")
    .description(TAGLINE)
    .version(readVersion(packageJson), "-V, --version", "Output the version number")
    .option("--config-file <path>", "Read settings from this TOML file")
    .option("--no-config-file", "Ignore the configuration file")
    .option("--bare-clone-dir <path>", "Directory holding bare clones")
    .option("--worktree-dir <path>", "Directory holding worktrees")
    .option("--verbose", "Show verbose logs and git invocations")
    .helpOption("-h, --help", "Display help for command")
    .configureHelp({
      showGlobalOptions: true,
      formatHelp: (cmd, helper) => {
        if (cmd.name() === "wtt") {
          return formatHelpText();
        }
        return formatSubcommandHelp(cmd, helper);
      }
    });

  registerSetupCommand(program, container);
  registerTeardownCommand(program, container);
  registerAddCommand(program, container);
  registerListCommand(program, container);
  registerRemoveCommand(program, container);

  program.action(() => {
    program.outputHelp();
  });

  return program;
}

export type { CliDependencies };

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) {
    applyExitOverride(child);
  }
}

function suppressCommanderOutput(command: Command): void {
  command.configureOutput({
    writeOut: () => {},
    writeErr: () => {}
  });
  for (const child of command.commands) {
    suppressCommanderOutput(child);
  }
}
