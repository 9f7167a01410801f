import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Engine kinds and provisioner interface only
        "src/engines/types.ts",
        // Public API re-exports
        "src/index.ts",
        // Test doubles
        "tests/support/**",
      ],
    },
  },
});
