import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import { createCommandResources, runCommandAction } from "./shared.js";

export interface SetupCommandOptions {
  repo?: string;
}

export function registerSetupCommand(
  program: Command,
  container: CliContainer
): void {
  program
    .command("setup")
    .description("Create a bare clone of a remote and its worktree directory.")
    .argument("<url>", "Remote repository URL")
    .option("--repo <name>", "Local repository name (defaults to the URL's last path segment)")
    .action(async (url: string, options: SetupCommandOptions, command: Command) => {
      await runCommandAction("setup", async () => {
        const { logger, orchestrator } = await createCommandResources(
          container,
          command,
          "setup"
        );
        logger.intro(`setup ${url}`);

        const result = await orchestrator.setup({ url, repo: options.repo });

        logger.resolved("Bare clone", result.bareClonePath);
        logger.resolved("Worktrees", result.worktreeRoot);
        logger.success(`Repository "${result.repo}" is ready.`);
      });
    });
}
