import { describe, it, expect } from "vitest";
import {
  BARE_DIR,
  REMOTE_URL,
  WORKTREE_DIR,
  createCliHarness
} from "../../../tests/cli-harness.js";

describe("teardown command", () => {
  it("removes the repository and reports each worktree", async () => {
    const { vol, logs, run } = createCliHarness();
    await run("setup", REMOTE_URL);
    await run("add", "--repo", "myrepo", "develop");
    logs.length = 0;

    await run("teardown", "myrepo");

    expect(logs).toEqual([
      "teardown myrepo",
      `Removed worktree ${WORKTREE_DIR}/myrepo/develop`,
      'Repository "myrepo" removed (1 worktree).'
    ]);
    expect(vol.existsSync(`${BARE_DIR}/myrepo.git`)).toBe(false);
    expect(vol.existsSync(`${WORKTREE_DIR}/myrepo`)).toBe(false);
  });

  it("stops on uncommitted changes unless forced", async () => {
    const { vol, git, logs, run } = createCliHarness();
    await run("setup", REMOTE_URL);
    await run("add", "--repo", "myrepo", "develop");
    git.dirty.add(`${WORKTREE_DIR}/myrepo/develop`);

    await expect(run("teardown", "myrepo")).rejects.toThrow(
      `wtt teardown: Worktree for "develop" at ${WORKTREE_DIR}/myrepo/develop has uncommitted changes. Commit or stash them, or pass --force.`
    );
    expect(vol.existsSync(`${WORKTREE_DIR}/myrepo/develop`)).toBe(true);

    await run("teardown", "--force", "myrepo");
    expect(logs.at(-1)).toBe('Repository "myrepo" removed (1 worktree).');
    expect(vol.existsSync(`${BARE_DIR}/myrepo.git`)).toBe(false);
  });

  it("rejects an unknown repository", async () => {
    const { run } = createCliHarness();

    await expect(run("teardown", "ghost")).rejects.toThrow(
      `wtt teardown: Repository "ghost" is not set up (no bare clone at ${BARE_DIR}/ghost.git).`
    );
  });
});
