import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polyeq/eq",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
