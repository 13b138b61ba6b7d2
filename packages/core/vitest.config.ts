import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polyeq/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
