import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["**/*.{test,spec}.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      TZ: "UTC",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "lcov"],
      reportsDirectory: "./coverage",
      include: ["main/**/*.ts", "shared/**/*.ts"],
      exclude: [
        "**/*.test.*",
        "**/*.property.test.*",
        "**/test-utils/**",
        // Entry points (thin glue code)
        "main/cli/**",
        // OS probes and screen grabbing need a real desktop session
        "main/services/screen-capture/screen-grabber.ts",
      ],
    },
  },
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
});
