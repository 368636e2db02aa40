import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./apps/cli/src", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/__tests__/**/*.test.ts", "apps/*/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
