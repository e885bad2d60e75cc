import { describe, it, expect } from "vitest";
import { Volume, createFsFromVolume } from "memfs";
import {
  isDirectory,
  isNotFound,
  pathExists,
  readFileIfExists,
  resolveRealPath,
  type FileSystem
} from "./file-system.js";

function createMemFs(): FileSystem {
  const vol = Volume.fromJSON({ "/work/app/README.md": "hello" });
  return createFsFromVolume(vol).promises as unknown as FileSystem;
}

describe("file-system helpers", () => {
  it("recognises ENOENT errors only", () => {
    expect(isNotFound(Object.assign(new Error("missing"), { code: "ENOENT" }))).toBe(true);
    expect(isNotFound(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
    expect(isNotFound("ENOENT")).toBe(false);
  });

  it("checks whether a path exists", async () => {
    const fs = createMemFs();

    await expect(pathExists(fs, "/work/app")).resolves.toBe(true);
    await expect(pathExists(fs, "/work/other")).resolves.toBe(false);
  });

  it("distinguishes directories from files", async () => {
    const fs = createMemFs();

    await expect(isDirectory(fs, "/work/app")).resolves.toBe(true);
    await expect(isDirectory(fs, "/work/app/README.md")).resolves.toBe(false);
    await expect(isDirectory(fs, "/work/missing")).resolves.toBe(false);
  });

  it("reads a file or returns null when it is missing", async () => {
    const fs = createMemFs();

    await expect(readFileIfExists(fs, "/work/app/README.md")).resolves.toBe("hello");
    await expect(readFileIfExists(fs, "/work/app/missing.md")).resolves.toBeNull();
  });

  it("resolves symlinks in existing and not-yet-created paths", async () => {
    const vol = Volume.fromJSON({ "/mnt/disk/work/app/README.md": "hello" });
    vol.symlinkSync("/mnt/disk/work", "/work");
    const fs = createFsFromVolume(vol).promises as unknown as FileSystem;

    await expect(resolveRealPath(fs, "/work/app")).resolves.toBe("/mnt/disk/work/app");
    await expect(resolveRealPath(fs, "/work/app/feature/x")).resolves.toBe(
      "/mnt/disk/work/app/feature/x"
    );
    await expect(resolveRealPath(fs, "/elsewhere/y")).resolves.toBe("/elsewhere/y");
  });
});
