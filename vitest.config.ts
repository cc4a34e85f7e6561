import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(rootDir, "shared", "index.ts"),
    },
  },
  test: {
    environment: "node",
    setupFiles: "./vitest.setup.ts",
    include: ["tests/**/*.test.ts"],
  },
});
