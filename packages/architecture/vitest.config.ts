import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "architecture",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 30000,
    globals: true,
    env: { ARCHLENS_LOG_LEVEL: "silent" },
  },
});
