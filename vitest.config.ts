import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["shared/src/**/__tests__/**/*.test.ts", "backend/src/**/__tests__/**/*.test.ts"],
  },
});
