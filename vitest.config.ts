import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // bcrypt hashing at low cost still takes a few ms per call
    testTimeout: 10_000,
  },
});
