import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test file patterns
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/cli/main.ts"],
      reporter: ["text", "html"],
    },

    // Tests create and delete temp directories; keep them in separate processes
    pool: "forks",

    testTimeout: 30000,
  },
});
