import * as nodeFs from "node:fs/promises";
import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { pathToFileURL } from "node:url";
import { log, symbols } from "@wtt/design-system";
import type { Command } from "commander";
import type { FileSystem } from "../utils/file-system.js";
import { CliError, SilentError } from "../errors.js";
import type { CliDependencies } from "./program.js";

const fsAdapter: FileSystem = nodeFs;

export function createCliMain(
  programFactory: (dependencies: CliDependencies) => Command
): () => Promise<void> {
  return async function runCli(): Promise<void> {
    const program = programFactory({
      fs: fsAdapter,
      env: {
        cwd: process.cwd(),
        homeDir: homedir(),
        variables: process.env
      },
      exitOverride: false
    });

    try {
      await program.parseAsync(process.argv);
    } catch (error) {
      if (error instanceof SilentError) {
        process.exit(1);
      }
      if (error instanceof Error) {
        reportError(error, process.argv.includes("--verbose"));
        process.exit(1);
      }
      throw error;
    }
  };
}

export function reportError(error: Error, verbose: boolean): void {
  if (error instanceof CliError && error.isUserError) {
    log.error(error.message);
    return;
  }
  log.error(`Error: ${error.message}`);
  if (verbose && error.stack) {
    log.message(error.stack, { symbol: symbols.verbose });
  }
}

export function isCliInvocation(
  argv: string[],
  moduleUrl: string,
  realpath: (path: string) => string = realpathSync
): boolean {
  const entry = argv.at(1);
  if (typeof entry !== "string") {
    return false;
  }

  const candidates = [pathToFileURL(entry).href];

  try {
    candidates.push(pathToFileURL(realpath(entry)).href);
  } catch (error) {
    // An unresolvable entry falls back to the direct comparison.
    if (!(error instanceof Error)) throw error;
  }

  return candidates.includes(moduleUrl);
}
