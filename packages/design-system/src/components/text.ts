import chalk from "chalk";
import { palette } from "../tokens/colors.js";

export const text = {
  intro(content: string): string {
    return palette.intro(content);
  },
  heading(content: string): string {
    return palette.header(content);
  },
  section(content: string): string {
    return chalk.bold(content);
  },
  command(content: string): string {
    return palette.accent(content);
  },
  argument(content: string): string {
    return palette.muted(content);
  },
  option(content: string): string {
    return chalk.yellow(content);
  },
  example(content: string): string {
    return palette.muted(content);
  },
  usageCommand(content: string): string {
    return chalk.green(content);
  }
} as const;
