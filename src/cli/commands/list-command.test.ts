import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { resetOutputFormatCache, resolveOutputFormat } from "@wtt/design-system";
import { REMOTE_URL, WORKTREE_DIR, createCliHarness } from "../../../tests/cli-harness.js";

describe("list command", () => {
  afterEach(() => {
    resetOutputFormatCache();
  });

  describe("markdown output", () => {
    beforeEach(() => {
      resetOutputFormatCache();
      resolveOutputFormat({ OUTPUT_FORMAT: "markdown" });
    });

    it("renders one row per worktree", async () => {
      const { logs, run } = createCliHarness();
      await run("setup", REMOTE_URL);
      await run("add", "--repo", "myrepo", "main");
      await run("add", "--repo", "myrepo", "feature/login");
      logs.length = 0;

      await run("list");

      expect(logs).toEqual([
        [
          "| Repo | Branch | Path |",
          "| :--- | :--- | :--- |",
          `| myrepo | main | ${WORKTREE_DIR}/myrepo/main |`,
          `| myrepo | feature/login | ${WORKTREE_DIR}/myrepo/feature/login |`
        ].join("\n")
      ]);
    });
  });

  describe("json output", () => {
    beforeEach(() => {
      resetOutputFormatCache();
      resolveOutputFormat({ OUTPUT_FORMAT: "json" });
    });

    it("limits the listing to the repository from the working directory", async () => {
      const { git, logs, run } = createCliHarness({ cwd: `${WORKTREE_DIR}/myrepo` });
      git.addRemote("https://example.com/team/alpha.git", {
        defaultBranch: "main",
        branches: ["main"]
      });
      await run("setup", REMOTE_URL);
      await run("setup", "https://example.com/team/alpha.git");
      await run("add", "--repo", "alpha", "main");
      await run("add", "develop");
      logs.length = 0;

      await run("ls");

      expect(JSON.parse(logs.join(""))).toEqual([
        { repo: "myrepo", branch: "develop", path: `${WORKTREE_DIR}/myrepo/develop` }
      ]);
    });

    it("prints an empty array when there are no worktrees", async () => {
      const { logs, run } = createCliHarness();
      await run("setup", REMOTE_URL);
      logs.length = 0;

      await run("list");

      expect(logs).toEqual(["[]"]);
    });
  });

  it("reports when there is nothing to list", async () => {
    const { logs, run } = createCliHarness();

    await run("list");

    expect(logs).toEqual(["No worktrees found."]);
  });

  it("rejects an unknown repository", async () => {
    const { run } = createCliHarness();

    await expect(run("list", "--repo", "ghost")).rejects.toThrow(
      'wtt list: Repository "ghost" is not set up'
    );
  });
});
