import { describe, it, expect } from "vitest";
import { CommanderError, type Command } from "commander";
import { Volume, createFsFromVolume } from "memfs";
import { stripAnsi } from "@wtt/design-system";
import type { FileSystem } from "../utils/file-system.js";
import { TAGLINE, createProgram } from "./program.js";

function createTestProgram(): { program: Command; output: string[] } {
  const vol = new Volume();
  vol.mkdirSync("/home/test", { recursive: true });
  const program = createProgram({
    fs: createFsFromVolume(vol).promises as unknown as FileSystem,
    env: { cwd: "/home/test", homeDir: "/home/test", variables: {} },
    logger: () => {}
  });
  const output: string[] = [];
  const capture = (command: Command): void => {
    command.configureOutput({
      writeOut: (str) => {
        output.push(str);
      },
      writeErr: (str) => {
        output.push(str);
      }
    });
    command.commands.forEach(capture);
  };
  capture(program);
  return { program, output };
}

describe("program", () => {
  it("registers every command", () => {
    const { program } = createTestProgram();

    expect(program.commands.map((command) => command.name())).toEqual([
      "setup",
      "teardown",
      "add",
      "list",
      "remove"
    ]);
  });

  it("shows help when invoked without arguments", async () => {
    const { program, output } = createTestProgram();

    await program.parseAsync(["node", "wtt"]);

    const plain = stripAnsi(output.join(""));
    expect(plain).toContain(TAGLINE);
    expect(plain).toContain("Usage: wtt <command> [...options]");
    expect(plain).toContain("wtt setup git@example.com:team/myrepo.git");
    expect(plain).toContain("--no-config-file");
    expect(plain).toContain("-V, --version");
  });

  it("formats subcommand help with global options", async () => {
    const { program, output } = createTestProgram();

    const error = await program
      .parseAsync(["node", "wtt", "add", "--help"])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: "commander.helpDisplayed" });
    const plain = stripAnsi(output.join(""));
    expect(plain).toContain("wtt - add");
    expect(plain).toContain("Usage: wtt add [options] <branch>");
    expect(plain).toContain("--base <ref>");
    expect(plain).toContain("Global Options:");
    expect(plain).toContain("--worktree-dir <path>");
  });

  it("prints the package version", async () => {
    const { program, output } = createTestProgram();

    await expect(program.parseAsync(["node", "wtt", "--version"])).rejects.toMatchObject({
      code: "commander.version"
    });
    expect(output.join("")).toBe("0.1.0\n");
  });
});
