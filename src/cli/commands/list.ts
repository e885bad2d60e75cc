import type { Command } from "commander";
import { renderTable, resolveOutputFormat, type TableColumn } from "@wtt/design-system";
import type { RepoWorktrees } from "../../services/worktree-orchestrator.js";
import type { CliContainer } from "../container.js";
import { createCommandResources, runCommandAction } from "./shared.js";

export interface ListCommandOptions {
  repo?: string;
}

const columns: TableColumn[] = [
  { name: "repo", title: "Repo", alignment: "left", maxLen: 30 },
  { name: "branch", title: "Branch", alignment: "left", maxLen: 40 },
  { name: "path", title: "Path", alignment: "left", maxLen: 80 }
];

export function registerListCommand(
  program: Command,
  container: CliContainer
): void {
  program
    .command("list")
    .alias("ls")
    .description("List worktrees for one repository, or for all of them.")
    .option("--repo <name>", "Repository name (inferred from the current directory)")
    .action(async (options: ListCommandOptions, command: Command) => {
      await runCommandAction("list", async () => {
        const { logger, orchestrator } = await createCommandResources(
          container,
          command,
          "list"
        );

        // Nothing is printed until every repository has been read.
        const repos = await orchestrator.list({ repo: options.repo });
        const rows = toRows(repos);

        if (rows.length === 0 && resolveOutputFormat() === "terminal") {
          logger.info("No worktrees found.");
          return;
        }
        logger.output(renderTable({ columns, rows }));
      });
    });
}

function toRows(repos: RepoWorktrees[]): Record<string, string>[] {
  return repos.flatMap(({ repo, worktrees }) =>
    worktrees.map((worktree) => ({
      repo,
      branch: worktree.branch,
      path: worktree.path
    }))
  );
}
