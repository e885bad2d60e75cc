import type { GitClient } from "./types.js";

export type BranchState =
  | { kind: "local" }
  | { kind: "remote"; remoteRef: string }
  | { kind: "absent" };

/**
 * Classifies `branch` against the refs already known to the bare clone.
 *
 * A local branch wins over a remote-tracking ref of the same name, even when
 * the two have diverged. Nothing is fetched.
 */
export async function classifyBranch(
  git: Pick<GitClient, "localBranchExists" | "remoteBranchExists">,
  bareClonePath: string,
  branch: string
): Promise<BranchState> {
  if (await git.localBranchExists(bareClonePath, branch)) {
    return { kind: "local" };
  }
  if (await git.remoteBranchExists(bareClonePath, branch)) {
    return { kind: "remote", remoteRef: `origin/${branch}` };
  }
  return { kind: "absent" };
}
