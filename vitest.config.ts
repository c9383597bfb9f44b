import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/**/*.test.ts", "runtime/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
  },
});
