// pattern: Imperative Shell
import { defineConfig, mergeConfig } from "vitest/config";

import workspaceConfig from "../../vitest.config.js";

export default mergeConfig(
  workspaceConfig,
  defineConfig({
    test: {
      // File patterns - only unit tests for this package
      include: ["src/**/*.{test,spec}.ts"],
      exclude: ["node_modules", "dist"],
    },
  })
);
