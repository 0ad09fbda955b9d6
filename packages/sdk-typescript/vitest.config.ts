import { defineConfig } from "vitest/config";
import { resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  resolve: {
    // Point @spanscope/core to its TypeScript source so tests don't
    // require the package to be built first.
    alias: {
      "@spanscope/core": resolve(__dirname, "../core/src/index.ts"),
    },
  },
  test: {
    globals: true,
  },
});
