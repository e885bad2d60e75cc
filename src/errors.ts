export type ErrorCode =
  | "CONFIG_ERROR"
  | "REPO_REQUIRED"
  | "UNKNOWN_REPO"
  | "REPO_RESOLUTION"
  | "INVALID_BRANCH_NAME"
  | "INVALID_BASE_REF"
  | "ALREADY_SET_UP"
  | "WORKTREE_ALREADY_EXISTS"
  | "DIRTY_WORKTREE"
  | "WORKTREE_NOT_FOUND"
  | "EXTERNAL_OPERATION_FAILED"
  | "COMMAND_FAILED"
  | "SILENT";

export interface CliErrorOptions {
  isUserError?: boolean;
  cause?: unknown;
}

export class CliError extends Error {
  readonly code: ErrorCode;
  readonly isUserError: boolean;

  constructor(code: ErrorCode, message: string, options: CliErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CliError";
    this.code = code;
    this.isUserError = options.isUserError ?? true;
  }
}

/**
 * Thrown to end the process with a non-zero exit code without printing.
 */
export class SilentError extends CliError {
  constructor(message = "", options: CliErrorOptions = {}) {
    super("SILENT", message, options);
    this.name = "SilentError";
  }
}

export class ConfigError extends CliError {
  readonly filePath: string;
  readonly field?: string;

  constructor(filePath: string, detail: string, field?: string) {
    const subject = field ? `"${field}" in ${filePath}` : filePath;
    super("CONFIG_ERROR", `Invalid configuration ${subject}: ${detail}`);
    this.name = "ConfigError";
    this.filePath = filePath;
    this.field = field;
  }
}

export class RepoRequiredError extends CliError {
  constructor(cwd: string, worktreeDir: string) {
    super(
      "REPO_REQUIRED",
      `No repository given and ${cwd} is not inside ${worktreeDir}. Pass --repo <name>.`
    );
    this.name = "RepoRequiredError";
  }
}

export class UnknownRepoError extends CliError {
  readonly repo: string;

  constructor(repo: string, bareClonePath: string) {
    super(
      "UNKNOWN_REPO",
      `Repository "${repo}" is not set up (no bare clone at ${bareClonePath}).`
    );
    this.name = "UnknownRepoError";
    this.repo = repo;
  }
}

export class RepoResolutionError extends CliError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super("REPO_RESOLUTION", `Invalid repository name "${input}": ${reason}.`);
    this.name = "RepoResolutionError";
    this.input = input;
  }
}

export class InvalidBranchNameError extends CliError {
  readonly branch: string;

  constructor(branch: string, reason: string) {
    super("INVALID_BRANCH_NAME", `Invalid branch name "${branch}": ${reason}.`);
    this.name = "InvalidBranchNameError";
    this.branch = branch;
  }
}

export class InvalidBaseRefError extends CliError {
  readonly base: string;

  constructor(base: string, reason: string) {
    super("INVALID_BASE_REF", `Invalid base "${base}": ${reason}.`);
    this.name = "InvalidBaseRefError";
    this.base = base;
  }
}

export class AlreadySetUpError extends CliError {
  readonly repo: string;

  constructor(repo: string, bareClonePath: string) {
    super(
      "ALREADY_SET_UP",
      `Repository "${repo}" is already set up at ${bareClonePath}.`
    );
    this.name = "AlreadySetUpError";
    this.repo = repo;
  }
}

export class WorktreeAlreadyExistsError extends CliError {
  readonly worktreePath: string;

  constructor(worktreePath: string, detail: string) {
    super("WORKTREE_ALREADY_EXISTS", `Worktree path ${worktreePath} ${detail}.`);
    this.name = "WorktreeAlreadyExistsError";
    this.worktreePath = worktreePath;
  }
}

export class DirtyWorktreeError extends CliError {
  readonly branch: string;
  readonly worktreePath: string;

  constructor(branch: string, worktreePath: string) {
    super(
      "DIRTY_WORKTREE",
      `Worktree for "${branch}" at ${worktreePath} has uncommitted changes. Commit or stash them, or pass --force.`
    );
    this.name = "DirtyWorktreeError";
    this.branch = branch;
    this.worktreePath = worktreePath;
  }
}

export class WorktreeNotFoundError extends CliError {
  readonly branch: string;
  readonly worktreePath: string;

  constructor(branch: string, worktreePath: string) {
    super(
      "WORKTREE_NOT_FOUND",
      `No worktree for "${branch}" is registered at ${worktreePath}.`
    );
    this.name = "WorktreeNotFoundError";
    this.branch = branch;
    this.worktreePath = worktreePath;
  }
}

export interface ExternalOperationDetails {
  step: string;
  target: string;
  remaining?: string[];
}

export class ExternalOperationError extends CliError {
  readonly step: string;
  readonly target: string;
  readonly remaining: string[];

  constructor(details: ExternalOperationDetails, cause: unknown) {
    const remaining = details.remaining ?? [];
    const reason = cause instanceof Error ? cause.message : String(cause);
    const lines = [`Failed to ${details.step} (${details.target}): ${reason}`];
    if (remaining.length > 0) {
      lines.push("Still on disk:", ...remaining.map((item) => `  ${item}`));
    }
    super("EXTERNAL_OPERATION_FAILED", lines.join("\n"), { cause });
    this.name = "ExternalOperationError";
    this.step = details.step;
    this.target = details.target;
    this.remaining = remaining;
  }
}

export class CommandFailedError extends CliError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("COMMAND_FAILED", `wtt ${command}: ${reason}`, {
      cause,
      isUserError: cause instanceof CliError ? cause.isUserError : false
    });
    this.name = "CommandFailedError";
    this.command = command;
  }
}
