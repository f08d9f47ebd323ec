import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/**/*.test.ts", "engine/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
