import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    // Tests spawn real child processes and bind loopback sockets
    testTimeout: 15000,

    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/**",
        "**/*.config.*",
        "**/coverage/**",
        "**/*.d.ts",
        "**/*.test.ts",
        "**/__tests__/**",
        "**/dist/**",
      ],
    },

    reporters: process.env.CI ? ["default", "github-actions"] : ["default"],
  },
});
