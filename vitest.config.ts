import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["cli/**/*.test.ts", "cli/tests/**/*_test.ts"],
    environment: "node",
  },
})
