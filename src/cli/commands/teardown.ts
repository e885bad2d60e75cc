import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import { createCommandResources, runCommandAction } from "./shared.js";

export interface TeardownCommandOptions {
  force?: boolean;
}

export function registerTeardownCommand(
  program: Command,
  container: CliContainer
): void {
  program
    .command("teardown")
    .description("Remove a repository's worktrees, bare clone and worktree directory.")
    .argument("<repo>", "Repository name")
    .option("-f, --force", "Remove worktrees even when they have uncommitted changes")
    .action(async (repo: string, options: TeardownCommandOptions, command: Command) => {
      await runCommandAction("teardown", async () => {
        const { logger, orchestrator } = await createCommandResources(
          container,
          command,
          "teardown"
        );
        logger.intro(`teardown ${repo}`);

        const result = await orchestrator.teardown({
          repo,
          force: options.force ?? false
        });

        for (const removed of result.removedWorktrees) {
          logger.info(`Removed worktree ${removed}`);
        }
        const count = result.removedWorktrees.length;
        logger.success(
          `Repository "${result.repo}" removed (${count} ${count === 1 ? "worktree" : "worktrees"}).`
        );
      });
    });
}
