export type {
  AddWorktreeOptions,
  CommandRunner,
  CommandRunnerOptions,
  CommandRunnerResult,
  GitClient,
  NewBranchOptions,
  RemoveWorktreeOptions,
  WorktreeEntry
} from "./types.js";
export { createGitClient, type GitClientOptions } from "./git-client.js";
export { classifyBranch, type BranchState } from "./branch-state.js";
export { parseWorktreeList } from "./porcelain.js";
export { runCommand } from "./run-command.js";
export { GitCommandError } from "./errors.js";
