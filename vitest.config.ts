// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "backend/services/redfish/test/**/*.spec.ts",
      "backend/services/shared/**/*.test.ts",
    ],
    setupFiles: ["backend/services/redfish/test/setup.ts"],
    hookTimeout: 30000,
    testTimeout: 30000,
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
    coverage: {
      provider: "v8",
      include: [
        "backend/services/redfish/src/**/*.ts",
        "backend/services/shared/**/*.ts",
      ],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "backend/services/redfish/test/**",
        "backend/services/shared/**/*.test.ts",
      ],
      reportsDirectory: "coverage",
      reporter: ["text", "html"],
    },
  },
});
