import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["insight_safety/**/__tests__/**/*.test.ts", "logging/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
