import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: false,
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      // Process entry points: side effects on load (validateEnv, listen, argv parsing).
      exclude: ["src/server.ts", "src/harness/server.ts", "src/cli/index.ts"],
      all: true,
      reporter: ["text"],
    },
  },
});
