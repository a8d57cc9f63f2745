import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages run from their sources; `dist` exists only after a build.
    alias: {
      "@runcase/core": fileURLToPath(new URL("../core/src/index.ts", import.meta.url)),
      "@runcase/harness": fileURLToPath(new URL("../harness/src/index.ts", import.meta.url)),
    },
  },
  test: {
    name: "test-runner",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 10000,
    globals: true,
  },
});
