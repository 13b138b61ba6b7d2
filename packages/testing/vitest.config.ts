import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polyeq/testing",
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
