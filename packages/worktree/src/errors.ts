export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number, stderr: string) {
    const detail = stderr.trim();
    super(
      `git ${args.join(" ")} exited with code ${exitCode}${detail ? `: ${detail}` : ""}`
    );
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
