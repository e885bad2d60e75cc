import type { WorktreeEntry } from "./types.js";

const BRANCH_REF_PREFIX = "refs/heads/";

/**
 * Parses the output of `git worktree list --porcelain`.
 *
 * Records are separated by blank lines; each starts with a `worktree <path>`
 * line followed by attribute lines.
 */
export function parseWorktreeList(output: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const rawLine of output.split("\n")) {
    const line = rawLine.replace(/\r$/, "");
    if (line.startsWith("worktree ")) {
      if (current) entries.push(current);
      current = {
        path: line.slice("worktree ".length),
        bare: false,
        detached: false,
        locked: false,
        prunable: false
      };
      continue;
    }
    if (!current || line.length === 0) {
      continue;
    }

    const [attribute, ...rest] = line.split(" ");
    const value = rest.join(" ");
    switch (attribute) {
      case "HEAD":
        current.head = value;
        break;
      case "branch":
        current.branch = value.startsWith(BRANCH_REF_PREFIX)
          ? value.slice(BRANCH_REF_PREFIX.length)
          : value;
        break;
      case "bare":
        current.bare = true;
        break;
      case "detached":
        current.detached = true;
        break;
      case "locked":
        current.locked = true;
        break;
      case "prunable":
        current.prunable = true;
        break;
    }
  }

  if (current) entries.push(current);
  return entries;
}
