import type { Dirent } from "node:fs";
import path from "node:path";
import {
  classifyBranch,
  type BranchState,
  type GitClient,
  type WorktreeEntry
} from "@wtt/worktree";
import type { Settings } from "../config/settings.js";
import type { ScopedLogger } from "../cli/logger.js";
import {
  AlreadySetUpError,
  CliError,
  DirtyWorktreeError,
  ExternalOperationError,
  UnknownRepoError,
  WorktreeAlreadyExistsError,
  WorktreeNotFoundError,
  type ExternalOperationDetails
} from "../errors.js";
import { validateBaseRef, validateBranchName } from "../layout/branch-name.js";
import {
  bareClonePath,
  isStrictDescendant,
  worktreePath,
  worktreeRoot
} from "../layout/path-layout.js";
import { requireRepo, resolveRepoScope } from "../layout/repo-context.js";
import { isRepoName, parseRepoName, repoNameFromUrl } from "../layout/repo-name.js";
import {
  isDirectory,
  isNotFound,
  pathExists,
  resolveRealPath,
  type FileSystem
} from "../utils/file-system.js";

const REMOTE = "origin";
const REMOTE_FETCH_REFSPEC = "+refs/heads/*:refs/remotes/origin/*";
const DETACHED_LABEL = "(detached)";

export interface OrchestratorDeps {
  settings: Settings;
  git: GitClient;
  fs: FileSystem;
  logger: ScopedLogger;
  cwd: string;
}

export type SetupInput = { url: string; repo?: string };
export type SetupResult = { repo: string; bareClonePath: string; worktreeRoot: string };

export type TeardownInput = { repo: string; force?: boolean };
export type TeardownResult = { repo: string; removedWorktrees: string[] };

export type AddInput = { branch: string; base?: string; repo?: string };
export type AddResult = {
  repo: string;
  branch: string;
  path: string;
  state: BranchState;
  base?: string;
  upstream?: string;
};

export type ListInput = { repo?: string };
export type WorktreeSummary = { branch: string; path: string };
export type RepoWorktrees = { repo: string; worktrees: WorktreeSummary[] };

export type RemoveInput = { branch: string; repo?: string; force?: boolean };
export type RemoveResult = { repo: string; branch: string; path: string };

export interface WorktreeOrchestrator {
  setup(input: SetupInput): Promise<SetupResult>;
  teardown(input: TeardownInput): Promise<TeardownResult>;
  add(input: AddInput): Promise<AddResult>;
  list(input?: ListInput): Promise<RepoWorktrees[]>;
  remove(input: RemoveInput): Promise<RemoveResult>;
}

export function createWorktreeOrchestrator(deps: OrchestratorDeps): WorktreeOrchestrator {
  const { settings, git, fs, logger, cwd } = deps;

  // Domain errors pass through; anything else raised by git or the filesystem is wrapped.
  async function step<T>(details: ExternalOperationDetails, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof CliError) throw error;
      throw new ExternalOperationError(details, error);
    }
  }

  async function requireSetUp(repo: string): Promise<string> {
    const barePath = bareClonePath(settings, repo);
    if (!(await pathExists(fs, barePath))) {
      throw new UnknownRepoError(repo, barePath);
    }
    return barePath;
  }

  async function linkedWorktrees(barePath: string): Promise<WorktreeEntry[]> {
    const entries = await step(
      { step: "list worktrees", target: barePath },
      () => git.listWorktrees(barePath)
    );
    return entries.filter((entry) => !entry.bare);
  }

  async function existingPaths(paths: string[]): Promise<string[]> {
    const result: string[] = [];
    for (const candidate of paths) {
      if (await pathExists(fs, candidate)) result.push(candidate);
    }
    return result;
  }

  async function discardPartialClone(barePath: string): Promise<string[]> {
    try {
      await fs.rm(barePath, { recursive: true, force: true });
      return [];
    } catch (error) {
      logger.warn(`Could not remove partial clone at ${barePath}: ${String(error)}`);
      return [barePath];
    }
  }

  // git records worktree paths with symlinks resolved.
  async function resolveWorktreePaths(
    target: string,
    entries: WorktreeEntry[]
  ): Promise<{ target: string; entries: { entry: WorktreeEntry; real: string }[] }> {
    return step({ step: "resolve worktree path", target }, async () => {
      const resolved: { entry: WorktreeEntry; real: string }[] = [];
      for (const entry of entries) {
        resolved.push({ entry, real: await resolveRealPath(fs, entry.path) });
      }
      return { target: await resolveRealPath(fs, target), entries: resolved };
    });
  }

  async function findRegistered(
    entries: WorktreeEntry[],
    target: string
  ): Promise<WorktreeEntry | undefined> {
    const resolved = await resolveWorktreePaths(target, entries);
    return resolved.entries.find(({ real }) => real === resolved.target)?.entry;
  }

  async function ensureVacant(barePath: string, target: string): Promise<void> {
    const resolved = await resolveWorktreePaths(target, await linkedWorktrees(barePath));
    const registered = resolved.entries.find(({ real }) => real === resolved.target)?.entry;
    const onDisk = await pathExists(fs, target);

    if (registered && onDisk) {
      throw new WorktreeAlreadyExistsError(
        target,
        `is already registered for ${branchLabel(registered)}`
      );
    }
    if (registered) {
      throw new WorktreeAlreadyExistsError(
        target,
        "is registered but its directory is missing (run `git worktree prune` in the bare clone)"
      );
    }
    if (onDisk) {
      throw new WorktreeAlreadyExistsError(
        target,
        "exists on disk but is not a registered worktree"
      );
    }

    const enclosing = resolved.entries.find(({ real }) => isStrictDescendant(real, resolved.target));
    if (enclosing) {
      throw new WorktreeAlreadyExistsError(
        target,
        `lies inside the worktree for ${branchLabel(enclosing.entry)} at ${enclosing.entry.path}`
      );
    }
  }

  async function resolveDefaultBase(barePath: string): Promise<string> {
    const defaultBranch = await step(
      { step: "determine the default branch", target: barePath },
      () => git.defaultBranch(barePath)
    );
    const hasRemote = await step(
      { step: "inspect refs", target: barePath },
      () => git.remoteBranchExists(barePath, defaultBranch)
    );
    return hasRemote ? `${REMOTE}/${defaultBranch}` : defaultBranch;
  }

  async function pruneEmptyParents(target: string, root: string): Promise<void> {
    let directory = path.dirname(target);
    while (isStrictDescendant(root, directory)) {
      const current = directory;
      const removed = await step(
        { step: "remove empty directory", target: current },
        async () => {
          const children = await fs.readdir(current, { withFileTypes: true });
          if (children.length > 0) return false;
          await fs.rmdir(current);
          return true;
        }
      );
      if (!removed) return;
      directory = path.dirname(directory);
    }
  }

  async function discoverRepos(): Promise<string[]> {
    let children: Dirent[];
    try {
      children = await fs.readdir(settings.worktreeDir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new ExternalOperationError(
        { step: "read worktree directory", target: settings.worktreeDir },
        error
      );
    }

    const repos: string[] = [];
    for (const child of children) {
      if (!child.isDirectory() || !isRepoName(child.name)) continue;
      if (await pathExists(fs, bareClonePath(settings, child.name))) {
        repos.push(child.name);
      }
    }
    return repos.sort();
  }

  return {
    async setup(input) {
      const repo =
        input.repo !== undefined ? parseRepoName(input.repo) : repoNameFromUrl(input.url);
      const barePath = bareClonePath(settings, repo);
      const root = worktreeRoot(settings, repo);

      if (await pathExists(fs, barePath)) {
        throw new AlreadySetUpError(repo, barePath);
      }

      logger.info(`Cloning bare repository to ${barePath}`);
      try {
        await fs.mkdir(settings.bareCloneDir, { recursive: true });
        await git.cloneBare(input.url, barePath);
        logger.verbose("Configuring remote tracking branches");
        await git.setConfig(barePath, "remote.origin.fetch", REMOTE_FETCH_REFSPEC);
        await git.fetch(barePath, REMOTE);
      } catch (error) {
        const remaining = await discardPartialClone(barePath);
        throw new ExternalOperationError(
          { step: "clone bare repository", target: input.url, remaining },
          error
        );
      }

      logger.verbose(`Creating worktree directory ${root}`);
      try {
        await fs.mkdir(root, { recursive: true });
      } catch (error) {
        throw new ExternalOperationError(
          { step: "create worktree root", target: root, remaining: [barePath] },
          error
        );
      }

      return { repo, bareClonePath: barePath, worktreeRoot: root };
    },

    async teardown(input) {
      const repo = parseRepoName(input.repo);
      const force = input.force ?? false;
      const barePath = await requireSetUp(repo);
      const root = worktreeRoot(settings, repo);

      const worktrees = await linkedWorktrees(barePath);

      // Every worktree is checked before anything is removed.
      const present: WorktreeEntry[] = [];
      for (const worktree of worktrees) {
        if (!(await isDirectory(fs, worktree.path))) {
          logger.verbose(`Skipping missing worktree ${worktree.path}`);
          continue;
        }
        if (!force) {
          const dirty = await step(
            { step: "check for uncommitted changes", target: worktree.path },
            () => git.isDirty(worktree.path)
          );
          if (dirty) {
            throw new DirtyWorktreeError(branchLabel(worktree), worktree.path);
          }
        }
        present.push(worktree);
      }

      const removedWorktrees: string[] = [];
      for (const [index, worktree] of present.entries()) {
        logger.verbose(`Removing worktree ${worktree.path}`);
        try {
          await git.removeWorktree(barePath, worktree.path, { force });
        } catch (error) {
          const remaining = await existingPaths([
            ...present.slice(index).map((entry) => entry.path),
            barePath,
            root
          ]);
          throw new ExternalOperationError(
            { step: "remove worktree", target: worktree.path, remaining },
            error
          );
        }
        removedWorktrees.push(worktree.path);
      }

      logger.verbose(`Removing bare clone ${barePath}`);
      try {
        await fs.rm(barePath, { recursive: true, force: true });
      } catch (error) {
        const remaining = await existingPaths([barePath, root]);
        throw new ExternalOperationError(
          { step: "remove bare clone", target: barePath, remaining },
          error
        );
      }

      logger.verbose(`Removing worktree directory ${root}`);
      try {
        await fs.rm(root, { recursive: true, force: true });
      } catch (error) {
        const remaining = await existingPaths([root]);
        throw new ExternalOperationError(
          { step: "remove worktree root", target: root, remaining },
          error
        );
      }

      return { repo, removedWorktrees };
    },

    async add(input) {
      const repo = requireRepo(input.repo, cwd, settings);
      const branch = validateBranchName(input.branch);
      const explicitBase = input.base === undefined ? undefined : validateBaseRef(input.base);
      const target = worktreePath(settings, repo, branch);
      const barePath = await requireSetUp(repo);

      await ensureVacant(barePath, target);

      const state = await step(
        { step: "inspect refs", target: branch },
        () => classifyBranch(git, barePath, branch)
      );
      logger.verbose(`Branch ${branch} classified as ${state.kind}`);

      switch (state.kind) {
        case "local": {
          await step({ step: "create worktree", target }, () =>
            git.addWorktree(barePath, { worktreePath: target, branch })
          );
          return { repo, branch, path: target, state };
        }
        case "remote": {
          await step({ step: "create worktree", target }, () =>
            git.addWorktree(barePath, {
              worktreePath: target,
              branch,
              newBranch: { startPoint: state.remoteRef, track: true }
            })
          );
          return { repo, branch, path: target, state, upstream: state.remoteRef };
        }
        case "absent": {
          const base = explicitBase ?? (await resolveDefaultBase(barePath));
          await step({ step: "create worktree", target }, () =>
            git.addWorktree(barePath, {
              worktreePath: target,
              branch,
              newBranch: { startPoint: base, track: false }
            })
          );
          // The remote branch does not exist yet; record the upstream so a plain push/pull works later.
          await step(
            { step: "configure upstream tracking", target: branch, remaining: [target] },
            async () => {
              await git.setConfig(target, `branch.${branch}.remote`, REMOTE);
              await git.setConfig(target, `branch.${branch}.merge`, `refs/heads/${branch}`);
            }
          );
          return { repo, branch, path: target, state, base, upstream: `${REMOTE}/${branch}` };
        }
      }
    },

    async list(input = {}) {
      const scope = resolveRepoScope(input.repo, cwd, settings);
      const repos = scope.kind === "repo" ? [scope.repo] : await discoverRepos();

      const result: RepoWorktrees[] = [];
      for (const repo of repos) {
        const barePath = await requireSetUp(repo);
        const entries = await linkedWorktrees(barePath);
        result.push({
          repo,
          worktrees: entries.map((entry) => ({
            branch: entry.branch ?? DETACHED_LABEL,
            path: entry.path
          }))
        });
      }
      return result;
    },

    async remove(input) {
      const repo = requireRepo(input.repo, cwd, settings);
      const branch = validateBranchName(input.branch);
      const force = input.force ?? false;
      const target = worktreePath(settings, repo, branch);
      const barePath = await requireSetUp(repo);

      const entries = await linkedWorktrees(barePath);
      const registered = await findRegistered(entries, target);
      if (!registered) {
        throw new WorktreeNotFoundError(branch, target);
      }

      if (!force && (await isDirectory(fs, target))) {
        const dirty = await step(
          { step: "check for uncommitted changes", target },
          () => git.isDirty(target)
        );
        if (dirty) {
          throw new DirtyWorktreeError(branch, target);
        }
      }

      await step({ step: "remove worktree", target }, () =>
        git.removeWorktree(barePath, registered.path, { force })
      );
      await pruneEmptyParents(target, worktreeRoot(settings, repo));

      return { repo, branch, path: target };
    }
  };
}

function branchLabel(entry: WorktreeEntry): string {
  return entry.branch ?? DETACHED_LABEL;
}
