import { InvalidBaseRefError, InvalidBranchNameError } from "../errors.js";

const FORBIDDEN_CHARACTERS = new Set(["~", "^", ":", "?", "*", "[", "\\"]);

/**
 * Validate a branch name against git's ref naming rules
 * (see `git check-ref-format`). Slashes are allowed and become nested
 * worktree directories.
 */
export function validateBranchName(branch: string): string {
  const fail = (reason: string): never => {
    throw new InvalidBranchNameError(branch, reason);
  };

  if (branch.length === 0) fail("must not be empty");
  if (branch === "@") fail("must not be a single @");
  if (branch.startsWith("-")) fail("must not start with -");
  if (branch.startsWith(".")) fail("must not start with a dot");
  if (branch.startsWith("/")) fail("must not start with /");
  if (branch.endsWith("/")) fail("must not end with /");
  if (branch.endsWith(".")) fail("must not end with a dot");
  if (branch.endsWith(".lock")) fail("must not end with .lock");
  if (branch.includes("..")) fail("must not contain ..");
  if (branch.includes("//")) fail("must not contain //");
  if (branch.includes("@{")) fail("must not contain @{");

  for (const character of branch) {
    const code = character.charCodeAt(0);
    if (code < 0x20 || code === 0x7f) fail("must not contain control characters");
    if (character === " ") fail("must not contain spaces");
    if (FORBIDDEN_CHARACTERS.has(character)) fail(`must not contain "${character}"`);
  }

  for (const component of branch.split("/")) {
    if (component.startsWith(".")) fail("path components must not start with a dot");
    if (component.endsWith(".lock")) fail("path components must not end with .lock");
  }

  return branch;
}

/** Any revision git accepts as a start point, as long as it cannot be read as an option. */
export function validateBaseRef(base: string): string {
  if (base.length === 0) {
    throw new InvalidBaseRefError(base, "must not be empty");
  }
  if (base.startsWith("-")) {
    throw new InvalidBaseRefError(base, "must not start with -");
  }
  if (/\s/.test(base)) {
    throw new InvalidBaseRefError(base, "must not contain whitespace");
  }
  return base;
}
