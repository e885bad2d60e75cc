export interface CliEnvironmentInit {
  cwd: string;
  homeDir: string;
  variables?: Record<string, string | undefined>;
}

export interface CliEnvironment {
  readonly cwd: string;
  readonly homeDir: string;
  readonly variables: Record<string, string | undefined>;
  readonly gitBinary: string;
}

export function createCliEnvironment(init: CliEnvironmentInit): CliEnvironment {
  const variables = init.variables ?? process.env;

  return {
    cwd: init.cwd,
    homeDir: init.homeDir,
    variables,
    gitBinary: resolveGitBinary(variables)
  };
}

export function resolveGitBinary(variables: Record<string, string | undefined>): string {
  const raw = variables.WTT_GIT;
  return typeof raw === "string" && raw.trim().length > 0 ? raw.trim() : "git";
}
