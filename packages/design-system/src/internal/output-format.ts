export type OutputFormat = "terminal" | "markdown" | "json";

const VALID_FORMATS: readonly OutputFormat[] = ["terminal", "markdown", "json"];

let cached: OutputFormat | undefined;

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return VALID_FORMATS.some((format) => format === value);
}

export function resolveOutputFormat(
  env: { OUTPUT_FORMAT?: string } = process.env
): OutputFormat {
  if (cached) {
    return cached;
  }
  const raw = env.OUTPUT_FORMAT?.toLowerCase();
  cached = isOutputFormat(raw) ? raw : "terminal";
  return cached;
}

export function resetOutputFormatCache(): void {
  cached = undefined;
}
