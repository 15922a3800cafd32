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
      exclude: ["src/**/index.ts", "src/core/types.ts", "src/compiler/xml-types.ts"],
      reporter: ["text", "html"],
      thresholds: {
        lines: 95,
        functions: 95,
        branches: 90,
        statements: 95,
      },
    },
  },
});
