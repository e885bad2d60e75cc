// Tokens
export { palette } from "./tokens/colors.js";
export type { Palette } from "./tokens/colors.js";

// Components
export { text } from "./components/text.js";
export { symbols } from "./components/symbols.js";
export { renderTable } from "./components/table.js";
export type { TableColumn, RenderTableOptions } from "./components/table.js";

// Prompts
export { intro, log } from "./prompts/index.js";

// Internal utilities
export { resolveOutputFormat, resetOutputFormatCache } from "./internal/output-format.js";
export type { OutputFormat } from "./internal/output-format.js";
export { stripAnsi } from "./internal/ansi.js";
