import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@heapdex/sdk": fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url)),
      "@heapdex/testkit": fileURLToPath(new URL("./packages/testkit/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/test/**/*.test.ts",
      "packages/*/benchmarks/**/*.bench.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
