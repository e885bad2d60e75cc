import { defineConfig } from "vitest/config";
import { readdirSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = fileURLToPath(new URL(".", import.meta.url));

function getPackageAliases(): Record<string, string> {
  const packagesDir = path.resolve(rootDir, "packages");
  const packages = readdirSync(packagesDir, { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => dirent.name);

  const aliases: Record<string, string> = {};
  for (const pkg of packages) {
    // @wtt/<name> -> packages/<name>/src/index.ts
    aliases[`@wtt/${pkg}`] = path.resolve(packagesDir, pkg, "src/index.ts");
  }
  return aliases;
}

export default defineConfig({
  resolve: {
    // Resolve workspace packages to source for tests (no build required)
    alias: getPackageAliases()
  },
  test: {
    globals: true,
    environment: "node",
    include: [
      "src/**/*.test.ts",      // Collocated unit tests
      "tests/**/*.test.ts",    // Cross-module tests
      "packages/**/*.test.ts"  // Package tests
    ],
    setupFiles: ["tests/setup.ts"]
  }
});
