export type CommandRunnerResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type CommandRunnerOptions = {
  cwd?: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandRunnerOptions
) => Promise<CommandRunnerResult>;

export type WorktreeEntry = {
  path: string;
  head?: string;
  branch?: string;
  bare: boolean;
  detached: boolean;
  locked: boolean;
  prunable: boolean;
};

export type NewBranchOptions = {
  startPoint: string;
  track: boolean;
};

export type AddWorktreeOptions = {
  worktreePath: string;
  branch: string;
  newBranch?: NewBranchOptions;
};

export type RemoveWorktreeOptions = {
  force?: boolean;
};

export interface GitClient {
  cloneBare(url: string, destination: string): Promise<void>;
  fetch(repoPath: string, remote: string): Promise<void>;
  addWorktree(repoPath: string, options: AddWorktreeOptions): Promise<void>;
  removeWorktree(
    repoPath: string,
    worktreePath: string,
    options?: RemoveWorktreeOptions
  ): Promise<void>;
  listWorktrees(repoPath: string): Promise<WorktreeEntry[]>;
  localBranchExists(repoPath: string, branch: string): Promise<boolean>;
  remoteBranchExists(repoPath: string, branch: string): Promise<boolean>;
  isDirty(worktreePath: string): Promise<boolean>;
  setConfig(repoPath: string, key: string, value: string): Promise<void>;
  defaultBranch(repoPath: string): Promise<string>;
}
