import type { Command } from "commander";
import type { AddResult } from "../../services/worktree-orchestrator.js";
import type { CliContainer } from "../container.js";
import { createCommandResources, runCommandAction } from "./shared.js";

export interface AddCommandOptions {
  base?: string;
  repo?: string;
}

export function registerAddCommand(
  program: Command,
  container: CliContainer
): void {
  program
    .command("add")
    .description("Create a worktree for a branch, creating the branch when needed.")
    .argument("<branch>", "Branch name")
    .option("--base <ref>", "Start point for a new branch (defaults to the remote default branch)")
    .option("--repo <name>", "Repository name (inferred from the current directory)")
    .action(async (branch: string, options: AddCommandOptions, command: Command) => {
      await runCommandAction("add", async () => {
        const { logger, orchestrator } = await createCommandResources(
          container,
          command,
          "add"
        );
        logger.intro(`add ${branch}`);

        const result = await orchestrator.add({
          branch,
          base: options.base,
          repo: options.repo
        });

        logger.info(describeBranchSource(result));
        logger.resolved("Worktree", result.path);
        logger.success(`Worktree for "${result.branch}" created in ${result.repo}.`);
      });
    });
}

export function describeBranchSource(result: AddResult): string {
  switch (result.state.kind) {
    case "local":
      return `Checked out existing local branch ${result.branch}`;
    case "remote":
      return `Created ${result.branch} tracking ${result.state.remoteRef}`;
    case "absent":
      return `Created ${result.branch} from ${result.base ?? "HEAD"} (upstream ${result.upstream ?? "unset"})`;
  }
}
