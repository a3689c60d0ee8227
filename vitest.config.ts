/**
 * @file Vitest testing framework configuration
 *
 * Globals are enabled so specs use `describe`/`it`/`expect` without imports.
 * Specs live beside sources (`src/**\/*.spec.ts[x]`) and end-to-end flows
 * under `spec/`.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.{ts,tsx}", "spec/**/*.spec.ts", "*.spec.ts"],
    setupFiles: [],
  },
});
