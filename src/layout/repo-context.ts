import path from "node:path";
import type { Settings } from "../config/settings.js";
import { RepoRequiredError } from "../errors.js";
import { isStrictDescendant } from "./path-layout.js";
import { isRepoName, parseRepoName, type RepoName } from "./repo-name.js";

export type RepoScope =
  | { kind: "repo"; repo: RepoName }
  | { kind: "all" };

/**
 * Decide which repository a command targets: the explicit `--repo` value, or
 * the first directory below `worktreeDir` when `cwd` sits inside it. A first
 * directory that is not a valid repository name gives no context.
 */
export function resolveRepoScope(
  explicit: string | undefined,
  cwd: string,
  settings: Settings
): RepoScope {
  if (explicit !== undefined) {
    return { kind: "repo", repo: parseRepoName(explicit) };
  }

  const worktreeDir = path.resolve(settings.worktreeDir);
  const current = path.resolve(cwd);
  if (!isStrictDescendant(worktreeDir, current)) {
    return { kind: "all" };
  }

  const [first = ""] = path.relative(worktreeDir, current).split(path.sep);
  if (!isRepoName(first)) {
    return { kind: "all" };
  }
  return { kind: "repo", repo: first };
}

export function requireRepo(
  explicit: string | undefined,
  cwd: string,
  settings: Settings
): RepoName {
  const scope = resolveRepoScope(explicit, cwd, settings);
  if (scope.kind === "all") {
    throw new RepoRequiredError(cwd, settings.worktreeDir);
  }
  return scope.repo;
}
