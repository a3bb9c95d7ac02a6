import { defineConfig, coverageConfigDefaults } from "vitest/config";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const isCI = process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "@pumpscreen/diabetes": resolve(__dirname, "packages/diabetes/src/index.ts"),
      "@pumpscreen/reader": resolve(__dirname, "packages/reader/src/index.ts"),
      "@pumpscreen/nightscout": resolve(__dirname, "packages/nightscout/src/index.ts"),
      "@pumpscreen/agent": resolve(__dirname, "packages/agent/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",

    coverage: {
      provider: "v8",
      reporter: isCI ? ["text", "json", "lcov"] : ["text", "html"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        ...coverageConfigDefaults.exclude,
        "**/*.test.ts",
        "**/__tests__/**",
        "**/index.ts",
        "packages/agent/src/cli.ts",
      ],
    },
  },
});
