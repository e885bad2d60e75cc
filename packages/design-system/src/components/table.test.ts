import { describe, it, expect, beforeEach } from "vitest";
import chalk from "chalk";
import { renderTable, type TableColumn } from "./table.js";
import type { Palette } from "../tokens/colors.js";
import { resetOutputFormatCache, resolveOutputFormat } from "../internal/output-format.js";

const identity = (s: string) => s;
const theme: Palette = {
  header: identity,
  intro: identity,
  resolvedSymbol: "",
  accent: identity,
  muted: identity,
  info: identity
};

const columns: TableColumn[] = [
  { name: "branch", title: "Branch", alignment: "left", maxLen: 20 },
  { name: "path", title: "Path", alignment: "left", maxLen: 40 }
];

const rows = [
  { branch: "main", path: "/work/app/main" },
  { branch: "feature/login", path: "/work/app/feature/login" }
];

function setFormat(format: string): void {
  resetOutputFormatCache();
  resolveOutputFormat({ OUTPUT_FORMAT: format });
}

describe("renderTable", () => {
  beforeEach(() => {
    resetOutputFormatCache();
  });

  describe("terminal format (default)", () => {
    beforeEach(() => {
      setFormat("terminal");
    });

    it("draws a box around the rows", () => {
      const result = renderTable({ theme, columns, rows });

      expect(result).toContain("feature/login");
      expect(result).toContain("/work/app/main");
      expect(result).toContain("┌");
      expect(result).toContain("┘");
    });
  });

  describe("markdown format", () => {
    beforeEach(() => {
      setFormat("markdown");
    });

    it("renders a header, a separator and one line per row", () => {
      expect(renderTable({ theme, columns, rows }).split("\n")).toEqual([
        "| Branch | Path |",
        "| :--- | :--- |",
        "| main | /work/app/main |",
        "| feature/login | /work/app/feature/login |"
      ]);
    });

    it("right-aligns columns that ask for it", () => {
      const result = renderTable({
        theme,
        columns: [
          { name: "repo", title: "Repo", alignment: "left", maxLen: 10 },
          { name: "count", title: "Worktrees", alignment: "right", maxLen: 10 }
        ],
        rows: [{ repo: "app", count: "2" }]
      });

      expect(result.split("\n")[1]).toBe("| :--- | ---: |");
    });

    it("strips ANSI escape codes and escapes pipes", () => {
      const result = renderTable({
        theme,
        columns,
        rows: [{ branch: chalk.red("topic"), path: "/work/a|b" }]
      });

      expect(result.split("\n")[2]).toBe("| topic | /work/a\\|b |");
    });

    it("renders an empty cell for a missing value", () => {
      const result = renderTable({ theme, columns, rows: [{ branch: "main" }] });

      expect(result.split("\n")[2]).toBe("| main |  |");
    });
  });

  describe("json format", () => {
    beforeEach(() => {
      setFormat("json");
    });

    it("returns one object per row keyed by column name", () => {
      expect(JSON.parse(renderTable({ theme, columns, rows }))).toEqual(rows);
    });

    it("returns an empty array for no rows", () => {
      expect(JSON.parse(renderTable({ theme, columns, rows: [] }))).toEqual([]);
    });
  });
});
