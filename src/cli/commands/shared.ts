import type { Command } from "commander";
import { resolveSettings, type Settings } from "../../config/settings.js";
import { CommandFailedError } from "../../errors.js";
import {
  createWorktreeOrchestrator,
  type WorktreeOrchestrator
} from "../../services/worktree-orchestrator.js";
import type { CliContainer } from "../container.js";
import type { ScopedLogger } from "../logger.js";

export interface GlobalFlags {
  configFile?: string | false;
  bareCloneDir?: string;
  worktreeDir?: string;
  verbose: boolean;
}

export interface CommandResources {
  logger: ScopedLogger;
  settings: Settings;
  orchestrator: WorktreeOrchestrator;
}

export function resolveGlobalFlags(command: Command): GlobalFlags {
  const opts = command.optsWithGlobals();
  const configFile: unknown = opts.configFile;
  const bareCloneDir: unknown = opts.bareCloneDir;
  const worktreeDir: unknown = opts.worktreeDir;
  return {
    configFile:
      configFile === false || typeof configFile === "string" ? configFile : undefined,
    bareCloneDir: typeof bareCloneDir === "string" ? bareCloneDir : undefined,
    worktreeDir: typeof worktreeDir === "string" ? worktreeDir : undefined,
    verbose: Boolean(opts.verbose)
  };
}

export async function createCommandResources(
  container: CliContainer,
  command: Command,
  scope: string
): Promise<CommandResources> {
  const flags = resolveGlobalFlags(command);
  const logger = container.loggerFactory.create({
    verbose: flags.verbose,
    scope
  });

  const settings = await resolveSettings(
    {
      configFile: flags.configFile,
      overrides: {
        bareCloneDir: flags.bareCloneDir,
        worktreeDir: flags.worktreeDir
      }
    },
    { fs: container.fs, env: container.env }
  );
  logger.verbose(`Bare clones: ${settings.bareCloneDir}`);
  logger.verbose(`Worktrees: ${settings.worktreeDir}`);

  const orchestrator = createWorktreeOrchestrator({
    settings,
    git: container.createGit(logger),
    fs: container.fs,
    logger,
    cwd: container.env.cwd
  });

  return { logger, settings, orchestrator };
}

/**
 * Command boundary: every failure inside `action` surfaces as a single
 * error naming the command.
 */
export async function runCommandAction(
  name: string,
  action: () => Promise<void>
): Promise<void> {
  try {
    await action();
  } catch (error) {
    throw new CommandFailedError(name, error);
  }
}
