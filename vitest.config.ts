import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      enabled: false,
      all: true,
      include: ["src/**/*.ts"],
      exclude: ["src/cli/commands/tui.tsx"],
      reporter: ["text", "html"],
    },
  },
});
