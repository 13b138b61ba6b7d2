import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polyeq/macros",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
