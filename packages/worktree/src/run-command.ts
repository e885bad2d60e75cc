import { spawn } from "node:child_process";
import { constants } from "node:os";
import type {
  CommandRunnerOptions,
  CommandRunnerResult
} from "./types.js";

export function runCommand(
  command: string,
  args: string[],
  options?: CommandRunnerOptions
): Promise<CommandRunnerResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      cwd: options?.cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" }
    });
    let stdout = "";
    let stderr = "";

    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      const exitCode = typeof error.errno === "number" ? error.errno : 127;
      resolve({
        stdout,
        stderr: stderr ? `${stderr}${error.message}` : error.message,
        exitCode
      });
    });

    child.on("close", (code, signal) => {
      if (code === null) {
        const reason = `terminated by ${signal ?? "an unknown signal"}`;
        resolve({
          stdout,
          stderr: stderr.trimEnd() ? `${stderr.trimEnd()}\n${reason}` : reason,
          exitCode: signal ? 128 + constants.signals[signal] : 1
        });
        return;
      }
      resolve({ stdout, stderr, exitCode: code });
    });
  });
}
