import { describe, it, expect } from "vitest";
import {
  BARE_DIR,
  HOME,
  REMOTE_URL,
  WORKTREE_DIR,
  createCliHarness
} from "../../../tests/cli-harness.js";

describe("add command", () => {
  it("creates a new branch from the remote default branch", async () => {
    const { vol, git, logs, run } = createCliHarness({
      cwd: `${WORKTREE_DIR}/myrepo/main`
    });
    await run("setup", REMOTE_URL);
    logs.length = 0;

    await run("add", "topic");

    expect(logs).toEqual([
      "add topic",
      "Created topic from origin/main (upstream origin/topic)",
      `Worktree: ${WORKTREE_DIR}/myrepo/topic`,
      'Worktree for "topic" created in myrepo.'
    ]);
    expect(vol.existsSync(`${WORKTREE_DIR}/myrepo/topic`)).toBe(true);
    expect(git.configValue(`${WORKTREE_DIR}/myrepo/topic`, "branch.topic.merge")).toBe(
      "refs/heads/topic"
    );
  });

  it("checks out an existing local branch", async () => {
    const { logs, run } = createCliHarness();
    await run("setup", REMOTE_URL);

    await run("add", "--repo", "myrepo", "main");

    expect(logs).toContain("Checked out existing local branch main");
  });

  it("tracks a branch that only exists on origin", async () => {
    const { git, logs, run } = createCliHarness();
    await run("setup", REMOTE_URL);
    git.repository(`${BARE_DIR}/myrepo.git`).remoteBranches.add("release/1.0");

    await run("add", "--repo", "myrepo", "release/1.0");

    expect(logs).toContain("Created release/1.0 tracking origin/release/1.0");
    expect(logs).toContain(`Worktree: ${WORKTREE_DIR}/myrepo/release/1.0`);
  });

  it("uses --base as the start point", async () => {
    const { logs, run } = createCliHarness();
    await run("setup", REMOTE_URL);

    await run("add", "--repo", "myrepo", "--base", "develop", "topic");

    expect(logs).toContain("Created topic from develop (upstream origin/topic)");
  });

  it("requires --repo outside the worktree directory", async () => {
    const { run } = createCliHarness();
    await run("setup", REMOTE_URL);

    await expect(run("add", "topic")).rejects.toThrow(
      `wtt add: No repository given and ${HOME} is not inside ${WORKTREE_DIR}. Pass --repo <name>.`
    );
  });

  it("rejects an invalid branch name", async () => {
    const { run } = createCliHarness();
    await run("setup", REMOTE_URL);

    await expect(run("add", "--repo", "myrepo", "topic.lock")).rejects.toThrow(
      'wtt add: Invalid branch name "topic.lock": must not end with .lock.'
    );
  });
});
