import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts", "scripts/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // main() boots the process; its parts are covered by src/index.test.ts and tests/integration
        "src/index.ts",
        // Pure type-only files (interfaces/types, no runtime logic)
        "src/identity/types.ts",
        "src/identity/lifecycle-repository.ts",
      ],
    },
  },
});
