import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@serial-ledger/platform-core",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
