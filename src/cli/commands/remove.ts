import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import { createCommandResources, runCommandAction } from "./shared.js";

export interface RemoveCommandOptions {
  repo?: string;
  force?: boolean;
}

export function registerRemoveCommand(
  program: Command,
  container: CliContainer
): void {
  program
    .command("remove")
    .alias("rm")
    .description("Remove the worktree for a branch. The branch itself is kept.")
    .argument("<branch>", "Branch name")
    .option("--repo <name>", "Repository name (inferred from the current directory)")
    .option("-f, --force", "Remove the worktree even when it has uncommitted changes")
    .action(async (branch: string, options: RemoveCommandOptions, command: Command) => {
      await runCommandAction("remove", async () => {
        const { logger, orchestrator } = await createCommandResources(
          container,
          command,
          "remove"
        );
        logger.intro(`remove ${branch}`);

        const result = await orchestrator.remove({
          branch,
          repo: options.repo,
          force: options.force ?? false
        });

        logger.success(`Removed worktree ${result.path}`);
      });
    });
}
