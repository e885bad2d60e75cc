import {
  createGitClient,
  runCommand,
  type CommandRunner,
  type GitClient
} from "@wtt/worktree";
import type { FileSystem } from "../utils/file-system.js";
import {
  createCliEnvironment,
  type CliEnvironment,
  type CliEnvironmentInit
} from "./environment.js";
import {
  createLoggerFactory,
  type LoggerFactory,
  type LoggerFn,
  type ScopedLogger
} from "./logger.js";

export interface CliDependencies {
  fs: FileSystem;
  env: CliEnvironmentInit;
  logger?: LoggerFn;
  commandRunner?: CommandRunner;
  /** Replaces the spawned git client entirely, e.g. with an in-memory fake. */
  git?: (logger: ScopedLogger) => GitClient;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface CliContainer {
  env: CliEnvironment;
  fs: FileSystem;
  loggerFactory: LoggerFactory;
  createGit(logger: ScopedLogger): GitClient;
}

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  const env = createCliEnvironment(dependencies.env);
  const loggerFactory = createLoggerFactory(dependencies.logger);
  const runner = dependencies.commandRunner ?? runCommand;

  const createGit = (logger: ScopedLogger): GitClient => {
    if (dependencies.git) {
      return dependencies.git(logger);
    }
    return createGitClient({
      runner,
      gitBinary: env.gitBinary,
      onCommand: (args) => logger.verbose(`$ ${env.gitBinary} ${args.join(" ")}`)
    });
  };

  return {
    env,
    fs: dependencies.fs,
    loggerFactory,
    createGit
  };
}
