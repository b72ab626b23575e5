import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Resolve the workspace package to source so tests run without a build
      "ocpp-bridge": path.resolve(
        __dirname,
        "packages/ocpp-bridge/src/index.ts",
      ),
    },
  },
  test: {
    testTimeout: 10000,
    hookTimeout: 10000,
    include: ["packages/*/test/**/*.test.ts"],
  },
});
