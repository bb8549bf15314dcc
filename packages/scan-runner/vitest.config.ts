import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "scan-runner",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 30000, // Process operations need longer timeout
  },
});
