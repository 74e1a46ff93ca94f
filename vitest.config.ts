import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    alias: {
      "@idl-collect/collector": fileURLToPath(new URL("./packages/collector/src/index.ts", import.meta.url)),
    },
  },
});
