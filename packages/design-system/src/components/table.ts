import { Table } from "console-table-printer";
import { palette, type Palette } from "../tokens/colors.js";
import { stripAnsi } from "../internal/ansi.js";
import { resolveOutputFormat } from "../internal/output-format.js";

export interface TableColumn {
  name: string;
  title: string;
  alignment: "left" | "right";
  maxLen: number;
}

export interface RenderTableOptions {
  theme?: Palette;
  columns: TableColumn[];
  rows: Record<string, string>[];
}

function border(theme: Palette, left: string, mid: string, right: string) {
  return {
    left: theme.muted(left),
    mid: theme.muted(mid),
    right: theme.muted(right),
    other: theme.muted("─")
  };
}

function renderTableTerminal({ theme = palette, columns, rows }: RenderTableOptions): string {
  const table = new Table({
    style: {
      headerTop: border(theme, "┌", "┬", "┐"),
      headerBottom: border(theme, "├", "┼", "┤"),
      tableBottom: border(theme, "└", "┴", "┘"),
      vertical: theme.muted("│"),
      rowSeparator: border(theme, "├", "┼", "┤")
    },
    columns: columns.map((column) => ({
      name: column.name,
      title: theme.header(column.title),
      alignment: column.alignment,
      maxLen: column.maxLen
    }))
  });

  table.addRows(rows);
  return table.render();
}

function cell(row: Record<string, string>, column: TableColumn): string {
  return stripAnsi(row[column.name] ?? "");
}

function renderTableMarkdown({ columns, rows }: RenderTableOptions): string {
  const header = `| ${columns.map((column) => column.title).join(" | ")} |`;
  const separator = `| ${columns
    .map((column) => (column.alignment === "right" ? "---:" : ":---"))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${columns.map((column) => cell(row, column).replace(/\|/g, "\\|")).join(" | ")} |`
  );
  return [header, separator, ...body].join("\n");
}

function renderTableJson({ columns, rows }: RenderTableOptions): string {
  const records = rows.map((row) =>
    Object.fromEntries(columns.map((column) => [column.name, cell(row, column)]))
  );
  return JSON.stringify(records, null, 2);
}

/**
 * Render rows for the active output format: a box-drawn table on a terminal,
 * a GitHub table for markdown, an array of objects for json.
 */
export function renderTable(options: RenderTableOptions): string {
  switch (resolveOutputFormat()) {
    case "markdown":
      return renderTableMarkdown(options);
    case "json":
      return renderTableJson(options);
    default:
      return renderTableTerminal(options);
  }
}
