import * as clack from "@clack/prompts";
import { text } from "../components/text.js";
import { stripAnsi } from "../internal/ansi.js";
import { resolveOutputFormat } from "../internal/output-format.js";

export { log } from "@clack/prompts";

export function intro(title: string): void {
  const format = resolveOutputFormat();
  if (format === "markdown") {
    process.stdout.write(`# ${stripAnsi(title)}\n\n`);
    return;
  }
  if (format === "json") {
    return;
  }
  clack.intro(text.intro(title));
}
