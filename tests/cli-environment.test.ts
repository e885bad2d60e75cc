import { describe, it, expect } from "vitest";
import { createCliEnvironment, resolveGitBinary } from "../src/cli/environment.js";

describe("CliEnvironment", () => {
  const cwd = "/workspace";
  const homeDir = "/home/test";

  it("keeps the working and home directories", () => {
    const environment = createCliEnvironment({ cwd, homeDir, variables: {} });

    expect(environment.cwd).toBe(cwd);
    expect(environment.homeDir).toBe(homeDir);
  });

  it("defaults to the process environment", () => {
    const environment = createCliEnvironment({ cwd, homeDir });

    expect(environment.variables).toBe(process.env);
  });

  it("runs git from PATH by default", () => {
    expect(createCliEnvironment({ cwd, homeDir, variables: {} }).gitBinary).toBe("git");
  });

  it("uses WTT_GIT when set", () => {
    const environment = createCliEnvironment({
      cwd,
      homeDir,
      variables: { WTT_GIT: " /opt/git/bin/git " }
    });

    expect(environment.gitBinary).toBe("/opt/git/bin/git");
  });

  it("ignores a blank WTT_GIT", () => {
    expect(resolveGitBinary({ WTT_GIT: "   " })).toBe("git");
  });
});
