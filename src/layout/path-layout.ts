import path from "node:path";
import type { Settings } from "../config/settings.js";
import { InvalidBranchNameError } from "../errors.js";

export function bareClonePath(settings: Settings, repo: string): string {
  return path.join(settings.bareCloneDir, `${repo}.git`);
}

export function worktreeRoot(settings: Settings, repo: string): string {
  return path.join(settings.worktreeDir, repo);
}

/**
 * Map a branch onto its worktree directory: each `/`-separated segment of the
 * branch becomes one nested directory under the repository's worktree root.
 */
export function worktreePath(settings: Settings, repo: string, branch: string): string {
  const root = worktreeRoot(settings, repo);
  const target = path.join(root, ...branch.split("/"));
  if (!isStrictDescendant(root, target)) {
    throw new InvalidBranchNameError(
      branch,
      `resolves to ${target}, outside of ${root}`
    );
  }
  return target;
}

export function isStrictDescendant(parent: string, candidate: string): boolean {
  const relative = path.relative(parent, candidate);
  return (
    relative.length > 0 &&
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}
