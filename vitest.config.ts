import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["__tests__/**/*.test.ts"],
    // stdio tests spawn real child processes
    testTimeout: 15_000,
    unstubGlobals: true,
  },
});
