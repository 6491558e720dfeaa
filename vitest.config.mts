// vitest.config.mts
//
// Vitest configuration for numeval.
// - TypeScript-first, Node environment
// - Path aliases via tsconfig (and a direct @ → src alias)
// - Coverage tuned for a library

import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  // Reads path aliases from tsconfig.json.
  plugins: [tsconfigPaths()],

  resolve: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
  },

  test: {
    // describe, it, expect, vi without imports
    globals: true,

    environment: "node",

    include: ["tests/**/*.spec.ts", "tests/**/*.test.ts"],

    exclude: [
      "node_modules",
      "dist",
      "coverage",
      "examples/**",
      ".git",
    ],

    // Clears the shared parse cache between tests.
    setupFiles: ["./tests/setupTests.ts"],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.d.ts",
        "src/index.ts",
        "src/core/types.ts",
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
