import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Integration-style suites build the full Fastify app on top of pg-mem, which
    // can exceed Vitest's default timeouts on contended runners.
    testTimeout: 20_000,
    hookTimeout: 20_000,
    include: ["services/*/src/__tests__/**/*.test.ts"],
    environment: "node"
  }
});
