import chalk from "chalk";

export const palette = {
  header: (text: string) => chalk.greenBright.bold(text),
  intro: (text: string) => chalk.bgGreen.black(` wtt - ${text} `),
  resolvedSymbol: chalk.green("◇"),
  accent: (text: string) => chalk.cyan(text),
  muted: (text: string) => chalk.dim(text),
  info: (text: string) => chalk.green(text)
};

export type Palette = typeof palette;
