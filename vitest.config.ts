import { defineConfig } from "vitest/config";
import path from "path";

const packagesDir = path.resolve(__dirname, "packages");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"]
  },
  resolve: {
    alias: [
      { find: "@hh-parser/shared", replacement: path.join(packagesDir, "shared/src") },
      { find: "@hh-parser/logger", replacement: path.join(packagesDir, "logger/src") },
      { find: "@hh-parser/parser", replacement: path.join(packagesDir, "parser/src") }
    ]
  }
});
