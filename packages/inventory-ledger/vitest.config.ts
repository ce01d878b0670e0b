import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@serial-ledger/inventory-ledger",
    environment: "node",
    include: ["tests/unit/**/*.test.ts", "tests/steps/**/*.steps.ts"],
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
