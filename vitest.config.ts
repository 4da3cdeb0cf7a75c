import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": rootDir
    }
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts", "app/**/__tests__/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent"
    }
  }
});
