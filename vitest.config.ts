import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // Lifecycle tests spawn and signal real child processes
    pool: "forks",
    testTimeout: 15000,
  },
});
