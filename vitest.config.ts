import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      exclude: [
        "tests/**",
        "examples/**",
        "vitest.config.ts",
        "src/types/**",
        "src/index.ts",
      ],
    },
  },
});
