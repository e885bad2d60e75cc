import { GitCommandError } from "./errors.js";
import { parseWorktreeList } from "./porcelain.js";
import { runCommand } from "./run-command.js";
import type {
  AddWorktreeOptions,
  CommandRunner,
  CommandRunnerResult,
  GitClient,
  RemoveWorktreeOptions,
  WorktreeEntry
} from "./types.js";

export type GitClientOptions = {
  runner?: CommandRunner;
  gitBinary?: string;
  onCommand?: (args: readonly string[]) => void;
};

export function createGitClient(options: GitClientOptions = {}): GitClient {
  const runner = options.runner ?? runCommand;
  const gitBinary = options.gitBinary ?? "git";

  const exec = async (args: string[]): Promise<CommandRunnerResult> => {
    options.onCommand?.(args);
    return runner(gitBinary, args);
  };

  const run = async (args: string[]): Promise<string> => {
    const result = await exec(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }
    return result.stdout;
  };

  // show-ref --verify --quiet exits 1 for a missing ref; anything else is a failure.
  const refExists = async (repoPath: string, ref: string): Promise<boolean> => {
    const args = ["-C", repoPath, "show-ref", "--verify", "--quiet", ref];
    const result = await exec(args);
    if (result.exitCode === 0) return true;
    if (result.exitCode === 1) return false;
    throw new GitCommandError(args, result.exitCode, result.stderr);
  };

  return {
    async cloneBare(url, destination) {
      await run(["clone", "--bare", url, destination]);
    },

    async fetch(repoPath, remote) {
      await run(["-C", repoPath, "fetch", remote]);
    },

    async addWorktree(repoPath: string, opts: AddWorktreeOptions) {
      const args = ["-C", repoPath, "worktree", "add"];
      if (opts.newBranch) {
        args.push(
          opts.newBranch.track ? "--track" : "--no-track",
          "-b",
          opts.branch,
          opts.worktreePath,
          opts.newBranch.startPoint
        );
      } else {
        args.push(opts.worktreePath, opts.branch);
      }
      await run(args);
    },

    async removeWorktree(
      repoPath: string,
      worktreePath: string,
      opts: RemoveWorktreeOptions = {}
    ) {
      const args = ["-C", repoPath, "worktree", "remove"];
      if (opts.force) args.push("--force");
      args.push(worktreePath);
      await run(args);
    },

    async listWorktrees(repoPath): Promise<WorktreeEntry[]> {
      const stdout = await run(["-C", repoPath, "worktree", "list", "--porcelain"]);
      return parseWorktreeList(stdout);
    },

    localBranchExists(repoPath, branch) {
      return refExists(repoPath, `refs/heads/${branch}`);
    },

    remoteBranchExists(repoPath, branch) {
      return refExists(repoPath, `refs/remotes/origin/${branch}`);
    },

    async isDirty(worktreePath) {
      const stdout = await run(["-C", worktreePath, "status", "--porcelain"]);
      return stdout.trim().length > 0;
    },

    async setConfig(repoPath, key, value) {
      await run(["-C", repoPath, "config", key, value]);
    },

    async defaultBranch(repoPath) {
      const stdout = await run(["-C", repoPath, "symbolic-ref", "--short", "HEAD"]);
      return stdout.trim();
    }
  };
}
