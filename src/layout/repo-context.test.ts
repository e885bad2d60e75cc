import { describe, it, expect } from "vitest";
import { RepoRequiredError, RepoResolutionError } from "../errors.js";
import { requireRepo, resolveRepoScope } from "./repo-context.js";

const settings = { bareCloneDir: "/data/bare", worktreeDir: "/work" };

describe("resolveRepoScope", () => {
  it("prefers an explicit repository", () => {
    expect(resolveRepoScope("myrepo", "/work/other/main", settings)).toEqual({
      kind: "repo",
      repo: "myrepo"
    });
  });

  it("takes the first directory below the worktree directory", () => {
    expect(resolveRepoScope(undefined, "/work/myrepo/feature/x", settings)).toEqual({
      kind: "repo",
      repo: "myrepo"
    });
  });

  it("resolves the worktree root itself", () => {
    expect(resolveRepoScope(undefined, "/work/myrepo", settings)).toEqual({
      kind: "repo",
      repo: "myrepo"
    });
  });

  it("covers all repositories from the worktree directory or outside it", () => {
    expect(resolveRepoScope(undefined, "/work", settings)).toEqual({ kind: "all" });
    expect(resolveRepoScope(undefined, "/home/test", settings)).toEqual({ kind: "all" });
  });

  it("ignores a working directory below a dot-directory", () => {
    expect(resolveRepoScope(undefined, "/work/.scratch/x", settings)).toEqual({ kind: "all" });
  });

  it("validates an explicit repository name", () => {
    expect(() => resolveRepoScope("team/app", "/work", settings)).toThrow(RepoResolutionError);
  });
});

describe("requireRepo", () => {
  it("returns the resolved repository", () => {
    expect(requireRepo(undefined, "/work/myrepo/main", settings)).toBe("myrepo");
  });

  it("fails outside the worktree directory without an explicit repository", () => {
    expect(() => requireRepo(undefined, "/home/test", settings)).toThrow(RepoRequiredError);
  });

  it("asks for a repository below a directory that cannot be one", () => {
    expect(() => requireRepo(undefined, "/work/.scratch/x", settings)).toThrow(RepoRequiredError);
  });
});
