import path from "node:path";
import { parse as parseToml } from "smol-toml";
import { ConfigError } from "../errors.js";
import { readFileIfExists, type FileSystem } from "../utils/file-system.js";

export type Settings = Readonly<{
  bareCloneDir: string;
  worktreeDir: string;
}>;

export type SettingsOverrides = {
  bareCloneDir?: string;
  worktreeDir?: string;
};

export type ResolveSettingsOptions = {
  /** Path to a config file, `false` to skip loading, or undefined for the default location. */
  configFile?: string | false;
  overrides?: SettingsOverrides;
};

export type SettingsEnvironment = {
  homeDir: string;
  cwd: string;
  variables: Record<string, string | undefined>;
};

type FileSettings = {
  bare_clone_dir?: string;
  worktree_dir?: string;
};

const FILE_KEYS = ["bare_clone_dir", "worktree_dir"] as const;

export function defaultSettings(env: SettingsEnvironment): Settings {
  const dataHome = nonEmpty(env.variables.XDG_DATA_HOME)
    ?? path.join(env.homeDir, ".local", "share");
  return {
    bareCloneDir: path.join(dataHome, "wtt", "bare"),
    worktreeDir: path.join(env.homeDir, "devel")
  };
}

export function defaultConfigPath(env: SettingsEnvironment): string {
  const configHome = nonEmpty(env.variables.XDG_CONFIG_HOME)
    ?? path.join(env.homeDir, ".config");
  return path.join(configHome, "wtt", "config.toml");
}

export async function resolveSettings(
  options: ResolveSettingsOptions,
  deps: { fs: FileSystem; env: SettingsEnvironment }
): Promise<Settings> {
  const { env } = deps;
  const defaults = defaultSettings(env);
  const fileSettings = await loadFileSettings(options.configFile, deps);
  const overrides = options.overrides ?? {};

  const bareCloneDir =
    resolveOverride(overrides.bareCloneDir, env)
    ?? fileSettings.bare_clone_dir
    ?? defaults.bareCloneDir;
  const worktreeDir =
    resolveOverride(overrides.worktreeDir, env)
    ?? fileSettings.worktree_dir
    ?? defaults.worktreeDir;

  return Object.freeze({ bareCloneDir, worktreeDir });
}

async function loadFileSettings(
  configFile: string | false | undefined,
  deps: { fs: FileSystem; env: SettingsEnvironment }
): Promise<FileSettings> {
  if (configFile === false) {
    return {};
  }

  const explicit = typeof configFile === "string";
  const filePath = explicit
    ? path.resolve(deps.env.cwd, expandHome(configFile, deps.env.homeDir))
    : defaultConfigPath(deps.env);

  let raw: string | null;
  try {
    raw = await readFileIfExists(deps.fs, filePath);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(filePath, `could not be read (${detail})`);
  }
  if (raw == null) {
    if (explicit) {
      throw new ConfigError(filePath, "file does not exist");
    }
    return {};
  }

  return parseFileSettings(raw, filePath, deps.env.homeDir);
}

export function parseFileSettings(
  raw: string,
  filePath: string,
  homeDir: string
): FileSettings {
  let parsed: unknown;
  try {
    parsed = parseToml(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message.split("\n")[0] : String(error);
    throw new ConfigError(filePath, `malformed TOML (${detail})`);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(filePath, "expected a TOML table");
  }

  const result: FileSettings = {};
  for (const key of FILE_KEYS) {
    const value = pickOptionalPath(parsed, key, filePath, homeDir);
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function pickOptionalPath(
  config: Record<string, unknown>,
  key: (typeof FILE_KEYS)[number],
  filePath: string,
  homeDir: string
): string | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(filePath, "expected a string", key);
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ConfigError(filePath, "expected a non-empty path", key);
  }
  const expanded = expandHome(trimmed, homeDir);
  if (!path.isAbsolute(expanded)) {
    throw new ConfigError(filePath, `expected an absolute or ~ path, got "${trimmed}"`, key);
  }
  return path.normalize(expanded);
}

function resolveOverride(
  value: string | undefined,
  env: SettingsEnvironment
): string | undefined {
  const trimmed = nonEmpty(value);
  if (trimmed === undefined) return undefined;
  return path.resolve(env.cwd, expandHome(trimmed, env.homeDir));
}

/**
 * Expand a leading `~` or `~/` to the home directory.
 */
export function expandHome(target: string, homeDir: string): string {
  if (target === "~") return homeDir;
  if (target.startsWith("~/") || target.startsWith("~\\")) {
    return path.join(homeDir, target.slice(2));
  }
  return target;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
