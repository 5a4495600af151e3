import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const resolvePackage = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@multisplit/layout-core": resolvePackage("./packages/layout-core/src/index.ts"),
      "@multisplit/layout-commands": resolvePackage("./packages/layout-commands/src/index.ts")
    }
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage"
    }
  }
});
