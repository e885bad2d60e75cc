import { RepoResolutionError } from "../errors.js";

/** A validated repository name: non-empty, no path separators, no leading dot. */
export type RepoName = string;

function repoNameProblem(input: string): string | undefined {
  if (input.length === 0) {
    return "must not be empty";
  }
  if (input.includes("/") || input.includes("\\")) {
    return "must not contain path separators";
  }
  if (input.startsWith(".")) {
    return "must not start with a dot";
  }
  return undefined;
}

export function isRepoName(input: string): input is RepoName {
  return repoNameProblem(input) === undefined;
}

export function parseRepoName(input: string): RepoName {
  const problem = repoNameProblem(input);
  if (problem !== undefined) {
    throw new RepoResolutionError(input, problem);
  }
  return input;
}

/**
 * Derive a repository name from a clone URL: the last path component with a
 * trailing `.git` removed.
 *
 * Accepts scp-style (`git@host:team/app.git`), URL-style
 * (`https://`, `ssh://`, `git://`, `file://`) and plain local paths.
 */
export function repoNameFromUrl(url: string): RepoName {
  const trimmed = url.trim();
  if (trimmed.length === 0) {
    throw new RepoResolutionError(url, "clone URL must not be empty");
  }

  const pathPart = extractUrlPath(trimmed).replace(/[/\\]+$/, "");
  const lastComponent = pathPart.split(/[/\\]/).at(-1) ?? "";
  const name = lastComponent.endsWith(".git")
    ? lastComponent.slice(0, -".git".length)
    : lastComponent;

  if (name.length === 0) {
    throw new RepoResolutionError(url, "could not derive a repository name from the URL");
  }
  return parseRepoName(name);
}

function extractUrlPath(url: string): string {
  const schemeIndex = url.indexOf("://");
  if (schemeIndex >= 0) {
    const afterScheme = url.slice(schemeIndex + 3);
    const slash = afterScheme.indexOf("/");
    return slash >= 0 ? afterScheme.slice(slash + 1) : "";
  }
  // scp-style host:path; a colon after a slash belongs to a local path
  const colon = url.indexOf(":");
  const firstSlash = url.indexOf("/");
  if (colon > 0 && (firstSlash === -1 || colon < firstSlash)) {
    return url.slice(colon + 1);
  }
  return url;
}
